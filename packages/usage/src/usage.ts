import { type ConfigurationSource, type RecordShape, resolveConfiguration } from "@flagcraft/core";

import { renderUsage } from "./render.js";
import { type FieldUsage, UsageDecoder } from "./usage-decoder.js";

export interface UsageOptions extends ConfigurationSource {
  /** Indent unaliased lines even when no field has an alias. Default: false. */
  readonly forceIndent?: boolean;
}

export interface CollectedUsage {
  readonly fields: readonly FieldUsage[];
  readonly description: string | undefined;
}

export interface Usage {
  readonly description: string | undefined;
  /** Rendered option lines, each newline-terminated */
  readonly options: string;
}

export function collectFieldUsage<T>(
  record: RecordShape<T>,
  source?: ConfigurationSource,
): CollectedUsage {
  const config = resolveConfiguration(record, source);
  const decoder = new UsageDecoder(config);
  record.decode(decoder);
  return { fields: decoder.fields(), description: config.description() };
}

/**
 * Usage text for `record`.
 *
 * @throws UnsupportedShapeError for declarations the decoder cannot walk
 */
export function usage<T>(record: RecordShape<T>, options: UsageOptions = {}): Usage {
  const { fields, description } = collectFieldUsage(record, options);
  return { description, options: renderUsage(fields, options.forceIndent ?? false) };
}
