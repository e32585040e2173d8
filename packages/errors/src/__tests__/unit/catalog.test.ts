import { describe, expect, it } from "vitest";
import { ERROR_CATALOG } from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect(domains).toEqual(new Set(["internal", "decode", "config"]));
  });

  it("should use sysexits codes", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect([64, 70, 78]).toContain(entry.exitCode);
    }
  });

  it("should have UPPER_SNAKE_CASE codes", () => {
    for (const code of Object.keys(ERROR_CATALOG)) {
      expect(code).toMatch(/^[A-Z][A-Z0-9_]*$/);
    }
  });

  it("should have titles and descriptions for all entries", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.title).toBeTruthy();
      expect(entry.description).toBeTruthy();
    }
  });

  it("should mark only internal errors as unexpected", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.isExpected).toBe(entry.baseType === "ValidationError");
    }
  });
});
