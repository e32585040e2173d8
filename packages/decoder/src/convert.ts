/**
 * Token text → scalar conversion.
 *
 * Integers are parsed at 64-bit width (signed kinds as i64, unsigned kinds
 * as u64) and then truncated to the declared width without an overflow
 * check, so `--level 300` read as `u8` yields 44. Text outside the 64-bit
 * range is a conversion failure, and so is an `int`/`uint` value that does
 * not fit a JavaScript safe integer.
 */

import type { FloatKind, IntegerKind } from "@flagcraft/core";
import { FlagConversionError, InvalidCharacterError } from "@flagcraft/errors";

interface IntegerWidth {
  readonly bits: number;
  readonly signed: boolean;
}

const INTEGER_WIDTHS: Readonly<Record<IntegerKind, IntegerWidth>> = {
  i8: { bits: 8, signed: true },
  i16: { bits: 16, signed: true },
  i32: { bits: 32, signed: true },
  i64: { bits: 64, signed: true },
  int: { bits: 64, signed: true },
  u8: { bits: 8, signed: false },
  u16: { bits: 16, signed: false },
  u32: { bits: 32, signed: false },
  u64: { bits: 64, signed: false },
  uint: { bits: 64, signed: false },
};

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\+?\d+$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATS: ReadonlyMap<string, number> = new Map([
  ["inf", Number.POSITIVE_INFINITY],
  ["+inf", Number.POSITIVE_INFINITY],
  ["-inf", Number.NEGATIVE_INFINITY],
  ["infinity", Number.POSITIVE_INFINITY],
  ["+infinity", Number.POSITIVE_INFINITY],
  ["-infinity", Number.NEGATIVE_INFINITY],
  ["nan", Number.NaN],
]);

export function parseIntegerToken(text: string, kind: IntegerKind): bigint {
  const { bits, signed } = INTEGER_WIDTHS[kind];
  if (!(signed ? SIGNED_INTEGER : UNSIGNED_INTEGER).test(text)) {
    throw new FlagConversionError(text, kind);
  }

  const wide = BigInt(text);
  const fitsWord = signed ? BigInt.asIntN(64, wide) === wide : BigInt.asUintN(64, wide) === wide;
  if (!fitsWord) {
    throw new FlagConversionError(text, kind);
  }

  const value = signed ? BigInt.asIntN(bits, wide) : BigInt.asUintN(bits, wide);
  if ((kind === "int" || kind === "uint") && !Number.isSafeInteger(Number(value))) {
    throw new FlagConversionError(text, kind);
  }
  return value;
}

export function parseFloatToken(text: string, kind: FloatKind): number {
  const special = SPECIAL_FLOATS.get(text.toLowerCase());
  let value: number;
  if (special !== undefined) {
    value = special;
  } else if (DECIMAL.test(text)) {
    value = Number(text);
  } else {
    throw new FlagConversionError(text, kind);
  }
  return kind === "f32" ? Math.fround(value) : value;
}

/** Exactly one code point, so astral characters count as one. */
export function parseCharToken(text: string): string {
  if ([...text].length !== 1) {
    throw new InvalidCharacterError(text);
  }
  return text;
}
