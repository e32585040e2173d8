/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { FlagcraftError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is an InternalError (bug, unsupported declaration) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a FlagcraftError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: FlagcraftError,
  code: C,
): error is FlagcraftError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (bad user input).
 * Returns false for non-FlagcraftError values.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
