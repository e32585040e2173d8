import {
  canonicalFlagName,
  FlagConfiguration,
  type FloatKind,
  type IntegerKind,
  type RecordVisitor,
} from "@flagcraft/core";
import { type UnsupportedShape, UnsupportedShapeError } from "@flagcraft/errors";

/** Usage metadata for one field, in declaration order. */
export interface FieldUsage {
  /** Canonical long form, e.g. `--line-count` */
  readonly canonical: string;
  readonly alias: string | undefined;
  readonly optional: boolean;
}

interface FieldDraft {
  canonical: string;
  alias: string | undefined;
  optional: boolean;
}

/**
 * Usage decoder: walks a record like the value decoder does, but records a
 * FieldUsage per field instead of reading arguments.
 *
 * Booleans and optionals are listed as optional, every other scalar as
 * mandatory. A sequence read on the configured rest field drops that
 * field's entry; a rest-named field of any other shape is listed normally.
 */
export class UsageDecoder implements RecordVisitor {
  private current: FieldDraft | undefined;
  private currentName: string | undefined;
  private readonly collected: FieldUsage[] = [];

  constructor(private readonly config: FlagConfiguration = FlagConfiguration.empty()) {}

  fields(): readonly FieldUsage[] {
    return [...this.collected];
  }

  readRecord<T>(name: string, _length: number, f: (visitor: RecordVisitor) => T): T {
    if (this.current !== undefined) {
      throw this.decline("nested-record", `${this.current.canonical} is a nested record (${name})`);
    }
    return f(this);
  }

  readField<T>(name: string, _index: number, f: (visitor: RecordVisitor) => T): T {
    this.currentName = name;
    this.current = {
      canonical: canonicalFlagName(name),
      alias: this.config.shortFor(name),
      optional: false,
    };
    return f(this);
  }

  readBool(): boolean {
    this.draft().optional = true;
    this.finalize();
    return false;
  }

  readString(): string {
    this.finalize();
    return "";
  }

  readInteger(_kind: IntegerKind): bigint {
    this.finalize();
    return 0n;
  }

  readFloat(_kind: FloatKind): number {
    this.finalize();
    return 0;
  }

  readChar(): string {
    this.finalize();
    return "\0";
  }

  readOption<T>(f: (visitor: RecordVisitor, present: boolean) => T): T {
    this.draft().optional = true;
    return f(this, true);
  }

  /** Zero elements: the rest field has no usage text of its own. */
  readSeq<T>(f: (visitor: RecordVisitor, length: number) => T): T {
    const restField = this.config.restFieldName();
    if (this.currentName !== restField) {
      throw this.decline(
        "sequence",
        `${this.label()} is a sequence; only the rest field "${restField}" may be one`,
      );
    }
    this.current = undefined;
    return f(this, 0);
  }

  readSeqElement<T>(_index: number, _f: (visitor: RecordVisitor) => T): T {
    throw this.decline("rest-element", "usage passes never read sequence elements");
  }

  readTuple<T>(arity: number, _f: (visitor: RecordVisitor) => T): T {
    throw this.decline("tuple", `${this.label()} is a ${arity}-tuple; tuples are not supported`);
  }

  readEnum<T>(name: string, _variants: readonly string[], _f: (visitor: RecordVisitor) => T): T {
    throw this.decline("enum", `${this.label()} is an enum (${name}); enums are not supported`);
  }

  readMap<T>(_f: (visitor: RecordVisitor) => T): T {
    throw this.decline("map", `${this.label()} is a map; maps are not supported`);
  }

  private draft(): FieldDraft {
    if (this.current === undefined) {
      throw this.decline("bare-value", "values must be declared as fields of a record");
    }
    return this.current;
  }

  private finalize(): void {
    const { canonical, alias, optional } = this.draft();
    this.collected.push({ canonical, alias, optional });
    this.current = undefined;
  }

  private label(): string {
    return this.currentName === undefined ? "value" : canonicalFlagName(this.currentName);
  }

  private decline(shape: UnsupportedShape, detail: string): UnsupportedShapeError {
    return new UnsupportedShapeError(shape, this.currentName, detail);
  }
}
