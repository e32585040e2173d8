import { type ConfigurationSource, type RecordShape, resolveConfiguration } from "@flagcraft/core";
import { type FlagcraftError, isFlagcraftError } from "@flagcraft/errors";

import { FlagDecoder } from "./flag-decoder.js";

export type DecodeOptions = ConfigurationSource;

export interface Decoded<T> {
  readonly value: T;
  /** Arguments no named field claimed, in their original order */
  readonly remaining: readonly string[];
}

export type DecodeResult<T> =
  | ({ readonly ok: true } & Decoded<T>)
  | { readonly ok: false; readonly error: FlagcraftError; readonly remaining: readonly string[] };

/**
 * Decodes `args` into a value of `record`.
 *
 * @throws ValidationError subclasses for arguments that do not fit the record
 * @throws UnsupportedShapeError for declarations the decoder cannot walk
 */
export function decodeFlags<T>(
  record: RecordShape<T>,
  args: readonly string[],
  options?: DecodeOptions,
): Decoded<T> {
  const decoder = new FlagDecoder(args, resolveConfiguration(record, options));
  const value = record.decode(decoder);
  return { value, remaining: decoder.remaining() };
}

/**
 * Like `decodeFlags`, but every flagcraft error comes back as `{ ok: false }`.
 * `remaining` then holds whatever the pass had not consumed when it stopped.
 */
export function safeDecodeFlags<T>(
  record: RecordShape<T>,
  args: readonly string[],
  options?: DecodeOptions,
): DecodeResult<T> {
  const decoder = new FlagDecoder(args, resolveConfiguration(record, options));
  try {
    const value = record.decode(decoder);
    return { ok: true, value, remaining: decoder.remaining() };
  } catch (error: unknown) {
    if (isFlagcraftError(error)) {
      return { ok: false, error, remaining: decoder.remaining() };
    }
    throw error;
  }
}
