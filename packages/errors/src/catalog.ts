/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes raised by the flagcraft packages.
 * Each error code maps to a process exit code (BSD sysexits) and a base
 * error type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: decode, config, internal
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "InternalError";

/** sysexits.h: EX_USAGE, EX_SOFTWARE, EX_CONFIG */
export type ExitCode = 64 | 70 | 78;

interface CatalogShape {
  readonly domain: string;
  readonly exitCode: ExitCode;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Defects in a record declaration or in the library
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    exitCode: 70,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  FLAG_UNSUPPORTED_SHAPE: {
    domain: "internal",
    exitCode: 70,
    baseType: "InternalError",
    isExpected: false,
    title: "Unsupported field shape",
    description:
      "The record declares a field shape the traversal protocol does not support (tuple, enum, map, nested record, misplaced sequence)",
  },

  // ============================================================================
  // DECODE ERRORS - Command-line input that does not fit the record
  // ============================================================================
  FLAG_REQUIRED: {
    domain: "decode",
    exitCode: 64,
    baseType: "ValidationError",
    isExpected: true,
    title: "Required flag missing",
    description: "A mandatory field has no matching flag among the arguments",
  },
  FLAG_VALUE_MISSING: {
    domain: "decode",
    exitCode: 64,
    baseType: "ValidationError",
    isExpected: true,
    title: "Flag value missing",
    description: "A value flag is the last argument and has no following value",
  },
  FLAG_CONVERSION_FAILED: {
    domain: "decode",
    exitCode: 64,
    baseType: "ValidationError",
    isExpected: true,
    title: "Flag value conversion failed",
    description: "The flag's value does not parse as the field's numeric type",
  },
  FLAG_INVALID_CHARACTER: {
    domain: "decode",
    exitCode: 64,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid character value",
    description: "A character field was given a value that is not exactly one character",
  },
  VALIDATION_FAILED: {
    domain: "decode",
    exitCode: 64,
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "Input validation failed",
  },

  // ============================================================================
  // CONFIG ERRORS - Declarative flag configuration
  // ============================================================================
  FLAG_CONFIGURATION_INVALID: {
    domain: "config",
    exitCode: 78,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid flag configuration",
    description: "A declarative flag configuration object failed schema validation",
  },
} as const satisfies Record<string, CatalogShape>;

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
