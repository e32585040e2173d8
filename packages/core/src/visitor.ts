/**
 * Field-traversal protocol shared by every decoder.
 *
 * A record declaration drives a visitor: `readRecord` once, then
 * `readField` once per field in declaration order, and inside each field
 * the read for the field's shape. Implementations decide what a read means
 * (consume tokens, describe the field) and decline shapes they cannot
 * handle by throwing `UnsupportedShapeError`.
 */

export type NarrowIntegerKind = "i8" | "i16" | "i32" | "u8" | "u16" | "u32" | "int" | "uint";
export type WideIntegerKind = "i64" | "u64";
export type IntegerKind = NarrowIntegerKind | WideIntegerKind;
export type FloatKind = "f32" | "f64";

export interface RecordVisitor {
  readBool(): boolean;
  readString(): string;
  /** Returns the value at 64-bit width; the shape narrows it to its own type. */
  readInteger(kind: IntegerKind): bigint;
  readFloat(kind: FloatKind): number;
  /** A string of exactly one code point. */
  readChar(): string;

  readOption<T>(f: (visitor: RecordVisitor, present: boolean) => T): T;
  readSeq<T>(f: (visitor: RecordVisitor, length: number) => T): T;
  readSeqElement<T>(index: number, f: (visitor: RecordVisitor) => T): T;

  readRecord<T>(name: string, length: number, f: (visitor: RecordVisitor) => T): T;
  readField<T>(name: string, index: number, f: (visitor: RecordVisitor) => T): T;

  // Declined by every decoder in this repository
  readTuple<T>(arity: number, f: (visitor: RecordVisitor) => T): T;
  readEnum<T>(name: string, variants: readonly string[], f: (visitor: RecordVisitor) => T): T;
  readMap<T>(f: (visitor: RecordVisitor) => T): T;
}
