import { describe, expect, it } from "vitest";
import {
  FlagcraftError,
  hasCode,
  InternalError,
  isExpectedError,
  isFlagcraftError,
  isInternalError,
  isValidationError,
  ValidationError,
} from "../../index.js";

describe("FlagcraftError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(FlagcraftError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.exitCode).toBe(70);
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should preserve stack traces", () => {
    const error = new InternalError("Stack test");
    expect(error.stack).toContain("Stack test");
  });

  it("should support metadata", () => {
    const error = new InternalError("With metadata", { field: "count" });

    expect(error.metadata).toEqual({ field: "count" });
  });

  it("should keep the cause from options", () => {
    const cause = new Error("root");
    const error = new InternalError({ code: "INTERNAL_ERROR", message: "wrapped", cause });

    expect(error.cause).toBe(cause);
  });
});

describe("ValidationError", () => {
  it("defaults to VALIDATION_FAILED", () => {
    const error = new ValidationError("bad input", [
      { field: "--count", message: "not a number", code: "TYPE" },
    ]);

    expect(error.code).toBe("VALIDATION_FAILED");
    expect(error.exitCode).toBe(64);
    expect(error.isExpected).toBe(true);
    expect(error.issues).toHaveLength(1);
  });

  it("takes a specific code through options", () => {
    const error = new ValidationError({ code: "FLAG_REQUIRED", message: "--name is required" });

    expect(error.code).toBe("FLAG_REQUIRED");
    expect(error.issues).toEqual([]);
  });
});

describe("guards", () => {
  it("discriminates base types", () => {
    const validation = new ValidationError("v");
    const internal = new InternalError("i");

    expect(isValidationError(validation)).toBe(true);
    expect(isValidationError(internal)).toBe(false);
    expect(isInternalError(internal)).toBe(true);
    expect(isFlagcraftError(new Error("plain"))).toBe(false);
  });

  it("hasCode narrows on the code literal", () => {
    const error: FlagcraftError = new ValidationError({ code: "FLAG_REQUIRED", message: "x" });

    expect(hasCode(error, "FLAG_REQUIRED")).toBe(true);
    expect(hasCode(error, "FLAG_VALUE_MISSING")).toBe(false);
  });

  it("isExpectedError is false for foreign values", () => {
    expect(isExpectedError(new ValidationError("v"))).toBe(true);
    expect(isExpectedError(new InternalError("i"))).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });
});
