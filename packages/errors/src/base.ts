import type { ErrorCode, ErrorDomain, ExitCode } from "./catalog.js";

/**
 * JSON shape produced by `FlagcraftError.toJSON()`
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  exitCode: ExitCode;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string>;
}

/**
 * Root of the flagcraft error hierarchy.
 *
 * Concrete classes fill the catalog-derived fields (`code`, `domain`,
 * `exitCode`, `isExpected`) from `ERROR_CATALOG`.
 */
export abstract class FlagcraftError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly exitCode: ExitCode;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: Error }) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      exitCode: this.exitCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Check if a value is a FlagcraftError instance
 */
export function isFlagcraftError(value: unknown): value is FlagcraftError {
  return value instanceof FlagcraftError;
}
