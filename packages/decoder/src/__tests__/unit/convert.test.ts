import { FlagConversionError, InvalidCharacterError } from "@flagcraft/errors";
import { describe, expect, it } from "vitest";
import { parseCharToken, parseFloatToken, parseIntegerToken } from "../../convert.js";

describe("parseIntegerToken", () => {
  it("parses signed and unsigned decimal text", () => {
    expect(parseIntegerToken("42", "int")).toBe(42n);
    expect(parseIntegerToken("-12", "i32")).toBe(-12n);
    expect(parseIntegerToken("+5", "u8")).toBe(5n);
    expect(parseIntegerToken("007", "uint")).toBe(7n);
  });

  it("truncates to narrow widths without reporting overflow", () => {
    expect(parseIntegerToken("300", "u8")).toBe(44n);
    expect(parseIntegerToken("200", "i8")).toBe(-56n);
    expect(parseIntegerToken("65537", "u16")).toBe(1n);
    expect(parseIntegerToken("4294967296", "i32")).toBe(0n);
  });

  it("keeps the full range of wide kinds", () => {
    expect(parseIntegerToken("18446744073709551615", "u64")).toBe(18446744073709551615n);
    expect(parseIntegerToken("-9223372036854775808", "i64")).toBe(-9223372036854775808n);
  });

  it("rejects text outside the 64-bit range", () => {
    expect(() => parseIntegerToken("18446744073709551616", "u64")).toThrow(
      "could not convert 18446744073709551616 to a(n) u64",
    );
    expect(() => parseIntegerToken("9223372036854775808", "i16")).toThrow(FlagConversionError);
  });

  it("rejects word-sized values beyond a safe integer", () => {
    expect(() => parseIntegerToken("9007199254740993", "int")).toThrow(
      "could not convert 9007199254740993 to a(n) int",
    );
    expect(parseIntegerToken("9007199254740991", "uint")).toBe(9007199254740991n);
  });

  it("rejects signs on unsigned kinds", () => {
    expect(() => parseIntegerToken("-1", "u32")).toThrow("could not convert -1 to a(n) u32");
  });

  it("rejects non-integer text", () => {
    for (const text of ["", "abc", "1.5", "1e3", "0x10", " 1"]) {
      expect(() => parseIntegerToken(text, "int")).toThrow(FlagConversionError);
    }
  });
});

describe("parseFloatToken", () => {
  it("parses decimal and exponent notation", () => {
    expect(parseFloatToken("2.5", "f64")).toBe(2.5);
    expect(parseFloatToken(".5", "f64")).toBe(0.5);
    expect(parseFloatToken("3", "f64")).toBe(3);
    expect(parseFloatToken("-1e3", "f64")).toBe(-1000);
  });

  it("parses infinities and NaN", () => {
    expect(parseFloatToken("inf", "f64")).toBe(Number.POSITIVE_INFINITY);
    expect(parseFloatToken("-inf", "f64")).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloatToken("NaN", "f64")).toBeNaN();
  });

  it("rounds f32 values to single precision", () => {
    expect(parseFloatToken("0.1", "f32")).toBe(Math.fround(0.1));
    expect(parseFloatToken("0.1", "f32")).not.toBe(0.1);
  });

  it("rejects malformed text", () => {
    expect(() => parseFloatToken("1.5.2", "f64")).toThrow("could not convert 1.5.2 to a(n) f64");
    expect(() => parseFloatToken("", "f32")).toThrow("could not convert  to a(n) f32");
  });
});

describe("parseCharToken", () => {
  it("accepts exactly one code point", () => {
    expect(parseCharToken("z")).toBe("z");
    expect(parseCharToken("é")).toBe("é");
    expect(parseCharToken("😀")).toBe("😀");
  });

  it("rejects anything else", () => {
    expect(() => parseCharToken("ab")).toThrow("ab is not a single character");
    expect(() => parseCharToken("")).toThrow(InvalidCharacterError);
  });
});
