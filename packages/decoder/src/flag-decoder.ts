import {
  canonicalFlagName,
  FlagConfiguration,
  type FloatKind,
  type IntegerKind,
  type RecordVisitor,
  resolveFieldPosition,
  TokenSequence,
} from "@flagcraft/core";
import {
  InternalError,
  MissingFlagError,
  MissingFlagValueError,
  type UnsupportedShape,
  UnsupportedShapeError,
} from "@flagcraft/errors";

import { parseCharToken, parseFloatToken, parseIntegerToken } from "./convert.js";

/**
 * `processing`: fields claim their flags from the token sequence.
 * `capturing-rest`: the rest field's elements are read, in order, from the
 * snapshot of tokens that were left when the rest field was reached.
 */
export type DecoderState =
  | { readonly mode: "processing" }
  | {
      readonly mode: "capturing-rest";
      readonly index: number;
      readonly snapshot: readonly string[];
    };

/**
 * Value decoder: walks a record's fields and claims matching tokens.
 *
 * Booleans consume only their flag; every other field consumes its flag and
 * the token after it. The configured rest field, which must be declared
 * last, receives whatever is left without consuming it. One instance serves
 * one decode pass.
 */
export class FlagDecoder implements RecordVisitor {
  private tokens: TokenSequence;
  private currentField: string | undefined;
  private state: DecoderState = { mode: "processing" };
  private done = false;

  constructor(
    args: readonly string[],
    private readonly config: FlagConfiguration = FlagConfiguration.empty(),
  ) {
    this.tokens = new TokenSequence(args);
  }

  /** Tokens not claimed by any named field. */
  remaining(): string[] {
    return this.tokens.toArray();
  }

  decoderState(): DecoderState {
    return this.state;
  }

  // ==========================================================================
  // Records and fields
  // ==========================================================================

  readRecord<T>(name: string, _length: number, f: (visitor: RecordVisitor) => T): T {
    if (this.currentField !== undefined) {
      throw this.decline("nested-record", `${this.flag()} is a nested record (${name})`);
    }
    return f(this);
  }

  readField<T>(name: string, _index: number, f: (visitor: RecordVisitor) => T): T {
    this.currentField = name;
    if (this.done) {
      throw this.decline(
        "field-after-rest",
        `${this.flag()} is declared after the rest field "${this.config.restFieldName()}"`,
      );
    }
    return f(this);
  }

  // ==========================================================================
  // Scalars
  // ==========================================================================

  readBool(): boolean {
    this.assertProcessing();
    const position = this.position();
    if (position === undefined) return false;

    this.tokens = this.tokens.without(position, 1);
    return true;
  }

  readString(): string {
    return this.readValue("string", (text) => text);
  }

  readInteger(kind: IntegerKind): bigint {
    return this.readValue("integer", (text) => parseIntegerToken(text, kind));
  }

  readFloat(kind: FloatKind): number {
    return this.readValue("float", (text) => parseFloatToken(text, kind));
  }

  readChar(): string {
    return this.readValue("character", parseCharToken);
  }

  readOption<T>(f: (visitor: RecordVisitor, present: boolean) => T): T {
    this.assertProcessing();
    return f(this, this.position() !== undefined);
  }

  // ==========================================================================
  // Rest capture
  // ==========================================================================

  readSeq<T>(f: (visitor: RecordVisitor, length: number) => T): T {
    this.assertProcessing();
    const field = this.field();
    const restField = this.config.restFieldName();
    if (field !== restField) {
      throw this.decline(
        "sequence",
        `${this.flag()} is a sequence; only the rest field "${restField}" may be one`,
      );
    }

    const snapshot = this.tokens.toArray();
    this.state = { mode: "capturing-rest", index: -1, snapshot };
    const value = f(this, snapshot.length);
    this.state = { mode: "processing" };
    this.done = true;
    return value;
  }

  readSeqElement<T>(_index: number, f: (visitor: RecordVisitor) => T): T {
    if (this.state.mode !== "capturing-rest") {
      throw this.decline("sequence", `${this.flag()} reads a sequence element outside a sequence`);
    }
    this.state = { ...this.state, index: this.state.index + 1 };
    return f(this);
  }

  // ==========================================================================
  // Declined shapes
  // ==========================================================================

  readTuple<T>(arity: number, _f: (visitor: RecordVisitor) => T): T {
    throw this.decline("tuple", `${this.flag()} is a ${arity}-tuple; tuples are not supported`);
  }

  readEnum<T>(name: string, _variants: readonly string[], _f: (visitor: RecordVisitor) => T): T {
    throw this.decline("enum", `${this.flag()} is an enum (${name}); enums are not supported`);
  }

  readMap<T>(_f: (visitor: RecordVisitor) => T): T {
    throw this.decline("map", `${this.flag()} is a map; maps are not supported`);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Converts the value token for the current field. In rest capture this is
   * the current snapshot element; otherwise the flag and its value are
   * removed once the conversion has succeeded.
   */
  private readValue<T>(kind: string, convert: (text: string) => T): T {
    if (this.state.mode === "capturing-rest") {
      const { index, snapshot } = this.state;
      const token = snapshot[index];
      if (token === undefined) {
        throw new InternalError(
          `rest element ${index} is outside the ${snapshot.length} captured tokens`,
        );
      }
      return convert(token);
    }

    const flag = this.flag();
    const position = this.position();
    if (position === undefined) {
      throw new MissingFlagError(flag);
    }
    const text = this.tokens.at(position + 1);
    if (text === undefined) {
      throw new MissingFlagValueError(flag, kind);
    }

    const value = convert(text);
    this.tokens = this.tokens.without(position, 2);
    return value;
  }

  private assertProcessing(): void {
    if (this.state.mode === "capturing-rest") {
      throw this.decline(
        "rest-element",
        `${this.flag()} elements must be strings, characters or numbers`,
      );
    }
  }

  private position(): number | undefined {
    return resolveFieldPosition(this.tokens, this.field(), this.config);
  }

  private field(): string {
    if (this.currentField === undefined) {
      throw new UnsupportedShapeError(
        "bare-value",
        undefined,
        "values must be declared as fields of a record",
      );
    }
    return this.currentField;
  }

  private flag(): string {
    return canonicalFlagName(this.field());
  }

  private decline(shape: UnsupportedShape, detail: string): UnsupportedShapeError {
    return new UnsupportedShapeError(shape, this.currentField, detail);
  }
}
