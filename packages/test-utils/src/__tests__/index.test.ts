import { describe, expect, it } from "vitest";
import { CompileFlags, PACKAGE_NAME, RecordingVisitor } from "../index.js";

describe("@flagcraft/test-utils", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@flagcraft/test-utils");
  });

  it("RecordingVisitor records a record walk", () => {
    const visitor = new RecordingVisitor(false);
    const value = CompileFlags.decode(visitor);

    expect(value).toEqual({ color: true, count: 7, maybe: undefined, some_some: true });
    expect(visitor.readBool).toHaveBeenCalledTimes(2);
  });
});
