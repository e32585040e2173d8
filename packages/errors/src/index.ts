/**
 * @flagcraft/errors
 *
 * Error taxonomy shared by the flagcraft packages.
 *
 * Every error carries a `.code` from the catalog. Use `error.code === "XXX"`
 * for fine-grained matching, or `instanceof ValidationError` /
 * `instanceof InternalError` for category matching. Validation errors are
 * bad user input; internal errors are defects in a record declaration.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, FlagcraftError, isFlagcraftError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type ExitCode,
} from "./catalog.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError } from "./bases/internal-error.js";
export { ValidationError } from "./bases/validation-error.js";

export type {
  FlagcraftErrorOptions,
  InternalCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isExpectedError, isInternalError, isValidationError } from "./guards.js";

// ============================================================================
// FLAG DECODING
// ============================================================================

export {
  FlagConfigurationError,
  FlagConversionError,
  InvalidCharacterError,
  MissingFlagError,
  MissingFlagValueError,
  type UnsupportedShape,
  UnsupportedShapeError,
} from "./flags.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@flagcraft/errors";
export const PACKAGE_VERSION = "0.1.0";
