/**
 * Flag decoding errors.
 *
 * Concrete:
 *   - MissingFlagError        (FLAG_REQUIRED)
 *   - MissingFlagValueError   (FLAG_VALUE_MISSING)
 *   - FlagConversionError     (FLAG_CONVERSION_FAILED)
 *   - InvalidCharacterError   (FLAG_INVALID_CHARACTER)
 *   - FlagConfigurationError  (FLAG_CONFIGURATION_INVALID)
 *   - UnsupportedShapeError   (FLAG_UNSUPPORTED_SHAPE)
 *
 * Messages are user-visible and kept short enough to print as-is.
 */

import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/** A mandatory field has no flag among the arguments. */
export class MissingFlagError extends ValidationError<"FLAG_REQUIRED"> {
  constructor(readonly flag: string) {
    super({
      code: "FLAG_REQUIRED",
      message: `${flag} is required`,
      issues: [{ field: flag, message: `${flag} is required`, code: "REQUIRED" }],
    });
  }
}

/** A value flag was given as the last argument. */
export class MissingFlagValueError extends ValidationError<"FLAG_VALUE_MISSING"> {
  constructor(
    readonly flag: string,
    readonly kind: string,
  ) {
    super({
      code: "FLAG_VALUE_MISSING",
      message: `${flag} is missing a following ${kind}`,
    });
  }
}

export class FlagConversionError extends ValidationError<"FLAG_CONVERSION_FAILED"> {
  constructor(
    readonly token: string,
    readonly kind: string,
  ) {
    super({
      code: "FLAG_CONVERSION_FAILED",
      message: `could not convert ${token} to a(n) ${kind}`,
      metadata: { token, kind },
    });
  }
}

export class InvalidCharacterError extends ValidationError<"FLAG_INVALID_CHARACTER"> {
  constructor(readonly token: string) {
    super({
      code: "FLAG_INVALID_CHARACTER",
      message: `${token} is not a single character`,
      metadata: { token },
    });
  }
}

export class FlagConfigurationError extends ValidationError<"FLAG_CONFIGURATION_INVALID"> {
  constructor(issues: readonly ValidationIssue[], cause?: Error) {
    super({
      code: "FLAG_CONFIGURATION_INVALID",
      message: `Flag configuration invalid:\n${issues
        .map((i) => `  - ${i.field}: ${i.message}`)
        .join("\n")}`,
      issues,
      cause,
    });
  }
}

/**
 * Shapes the traversal protocol declines. Raised while walking a record
 * declaration, so it points at a programming error rather than bad input.
 */
export type UnsupportedShape =
  | "tuple"
  | "enum"
  | "map"
  | "nested-record"
  | "sequence"
  | "field-after-rest"
  | "bare-value"
  | "rest-element";

export class UnsupportedShapeError extends InternalError<"FLAG_UNSUPPORTED_SHAPE"> {
  constructor(
    readonly shape: UnsupportedShape,
    readonly field: string | undefined,
    detail: string,
  ) {
    super({
      code: "FLAG_UNSUPPORTED_SHAPE",
      message: detail,
      metadata: { shape, ...(field !== undefined ? { field } : {}) },
    });
  }
}
