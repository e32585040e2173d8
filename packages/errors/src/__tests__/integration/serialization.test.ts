import { describe, expect, it } from "vitest";
import { FlagConversionError, MissingFlagError } from "../../index.js";

describe("toJSON", () => {
  it("serializes catalog-derived fields", () => {
    const json = new MissingFlagError("--count").toJSON();

    expect(json).toMatchObject({
      _tag: "ValidationError",
      name: "MissingFlagError",
      code: "FLAG_REQUIRED",
      message: "--count is required",
      domain: "decode",
      exitCode: 64,
      isExpected: true,
    });
    expect(json.metadata).toBeUndefined();
    expect(typeof json.timestamp).toBe("string");
  });

  it("includes metadata when present", () => {
    const json = new FlagConversionError("1.5", "int").toJSON();

    expect(json.metadata).toEqual({ token: "1.5", kind: "int" });
  });

  it("round-trips through JSON.stringify", () => {
    const parsed: unknown = JSON.parse(JSON.stringify(new MissingFlagError("--name")));

    expect(parsed).toMatchObject({ code: "FLAG_REQUIRED", message: "--name is required" });
  });
});
