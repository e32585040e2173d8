/**
 * Record declarations.
 *
 * A record is declared once with `record(name, { field: flag.x(), ... })`.
 * Object key order is the field declaration order, and the record's value
 * type is inferred from the field shapes:
 *
 *   const Options = record("Options", {
 *     verbose: flag.bool(),
 *     line_count: flag.int("u32"),
 *     color: flag.optional(flag.string()),
 *     rest: flag.list(flag.string()),
 *   });
 *   type Options = Infer<typeof Options>;
 *
 * Decoding a value is `shape.decode(visitor)`: each shape calls the visitor
 * read for its own kind, so the same declaration drives every decoder.
 */

import { FlagConversionError } from "@flagcraft/errors";

import type {
  FloatKind,
  NarrowIntegerKind,
  RecordVisitor,
  WideIntegerKind,
} from "./visitor.js";

export interface Shape<T> {
  decode(visitor: RecordVisitor): T;
}

export type Infer<S> = S extends Shape<infer T> ? T : never;

export type FieldShapes = Readonly<Record<string, Shape<unknown>>>;

export type InferFields<F extends FieldShapes> = { [K in keyof F]: Infer<F[K]> };

export class RecordShape<T> implements Shape<T> {
  constructor(
    readonly name: string,
    readonly fields: FieldShapes,
    private readonly build: (values: Readonly<Record<string, unknown>>) => T,
  ) {}

  fieldNames(): readonly string[] {
    return Object.keys(this.fields);
  }

  decode(visitor: RecordVisitor): T {
    const entries = Object.entries(this.fields);
    return visitor.readRecord(this.name, entries.length, (recordVisitor) => {
      const values: Record<string, unknown> = {};
      entries.forEach(([name, shape], index) => {
        values[name] = recordVisitor.readField(name, index, (fieldVisitor) =>
          shape.decode(fieldVisitor),
        );
      });
      return this.build(values);
    });
  }
}

export function record<F extends FieldShapes>(
  name: string,
  fields: F,
): RecordShape<InferFields<F>> {
  // Every key of `fields` was written by decode() above with the value its
  // shape produced, which is exactly InferFields<F>.
  return new RecordShape(name, fields, (values) => values as InferFields<F>);
}

function shape<T>(decode: (visitor: RecordVisitor) => T): Shape<T> {
  return { decode };
}

export const flag = {
  bool: (): Shape<boolean> => shape((v) => v.readBool()),

  string: (): Shape<string> => shape((v) => v.readString()),

  /** Narrow kinds come back as `number`; `int`/`uint` must fit a safe integer. */
  int: (kind: NarrowIntegerKind = "int"): Shape<number> =>
    shape((v) => Number(v.readInteger(kind))),

  bigint: (kind: WideIntegerKind): Shape<bigint> => shape((v) => v.readInteger(kind)),

  float: (kind: FloatKind = "f64"): Shape<number> => shape((v) => v.readFloat(kind)),

  char: (): Shape<string> => shape((v) => v.readChar()),

  optional: <T>(inner: Shape<T>): Shape<T | undefined> =>
    shape((v) => v.readOption((ov, present) => (present ? inner.decode(ov) : undefined))),

  list: <T>(element: Shape<T>): Shape<T[]> =>
    shape((v) =>
      v.readSeq((sv, length) =>
        Array.from({ length }, (_, index) =>
          sv.readSeqElement(index, (ev) => element.decode(ev)),
        ),
      ),
    ),

  tuple: (...elements: readonly Shape<unknown>[]): Shape<unknown[]> =>
    shape((v) => v.readTuple(elements.length, (tv) => elements.map((e) => e.decode(tv)))),

  oneOf: <V extends string>(name: string, variants: readonly V[]): Shape<V> =>
    shape((v) =>
      v.readEnum(name, variants, (ev) => {
        const text = ev.readString();
        const match = variants.find((variant) => variant === text);
        if (match === undefined) {
          throw new FlagConversionError(text, name);
        }
        return match;
      }),
    ),

  map: <T>(value: Shape<T>): Shape<Map<string, T>> =>
    shape((v) => v.readMap((mv) => new Map([[mv.readString(), value.decode(mv)]]))),
} as const;
