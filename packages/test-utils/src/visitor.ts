import type { FloatKind, IntegerKind, RecordVisitor } from "@flagcraft/core";
import { vi } from "vitest";

/**
 * RecordVisitor that records every call and returns fixed values.
 *
 * Optionals report `present`, sequences report `sequenceLength` elements.
 *
 * @example
 * ```typescript
 * const visitor = new RecordingVisitor();
 * Options.decode(visitor);
 * expect(visitor.calls).toEqual(["record:Options:1", "field:0:verbose", "bool"]);
 * ```
 */
export class RecordingVisitor implements RecordVisitor {
  readonly calls: string[] = [];

  constructor(
    private readonly present = true,
    private readonly sequenceLength = 0,
  ) {}

  readonly readBool = vi.fn((): boolean => {
    this.calls.push("bool");
    return true;
  });

  readonly readString = vi.fn((): string => {
    this.calls.push("string");
    return "text";
  });

  readonly readInteger = vi.fn((kind: IntegerKind): bigint => {
    this.calls.push(`integer:${kind}`);
    return 7n;
  });

  readonly readFloat = vi.fn((kind: FloatKind): number => {
    this.calls.push(`float:${kind}`);
    return 1.5;
  });

  readonly readChar = vi.fn((): string => {
    this.calls.push("char");
    return "x";
  });

  readOption<T>(f: (visitor: RecordVisitor, present: boolean) => T): T {
    this.calls.push(`option:${this.present}`);
    return f(this, this.present);
  }

  readSeq<T>(f: (visitor: RecordVisitor, length: number) => T): T {
    this.calls.push(`seq:${this.sequenceLength}`);
    return f(this, this.sequenceLength);
  }

  readSeqElement<T>(index: number, f: (visitor: RecordVisitor) => T): T {
    this.calls.push(`element:${index}`);
    return f(this);
  }

  readRecord<T>(name: string, length: number, f: (visitor: RecordVisitor) => T): T {
    this.calls.push(`record:${name}:${length}`);
    return f(this);
  }

  readField<T>(name: string, index: number, f: (visitor: RecordVisitor) => T): T {
    this.calls.push(`field:${index}:${name}`);
    return f(this);
  }

  readTuple<T>(arity: number, f: (visitor: RecordVisitor) => T): T {
    this.calls.push(`tuple:${arity}`);
    return f(this);
  }

  readEnum<T>(name: string, variants: readonly string[], f: (visitor: RecordVisitor) => T): T {
    this.calls.push(`enum:${name}:${variants.length}`);
    return f(this);
  }

  readMap<T>(f: (visitor: RecordVisitor) => T): T {
    this.calls.push("map");
    return f(this);
  }
}
