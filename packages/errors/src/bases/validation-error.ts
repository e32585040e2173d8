import { FlagcraftError } from "../base.js";
import { ERROR_CATALOG, type CodesForBase, type ErrorDomain, type ExitCode } from "../catalog.js";
import type { FlagcraftErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

type ValidationErrorOptions<C extends ValidationCode> = FlagcraftErrorOptions<C> & {
  issues?: readonly ValidationIssue[] | undefined;
};

/**
 * Errors caused by command-line input or configuration that does not fit
 * the declared record. The `.code` field discriminates the specific error.
 */
export class ValidationError<
  C extends ValidationCode = "VALIDATION_FAILED",
> extends FlagcraftError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly exitCode: ExitCode;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationErrorOptions<C>);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
  );
  constructor(
    messageOrOptions: string | ValidationErrorOptions<C>,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
  ) {
    const opts: ValidationErrorOptions<C> =
      typeof messageOrOptions === "string"
        ? // The message-only overload is only reachable with the default code
          { code: "VALIDATION_FAILED" as C, message: messageOrOptions, issues, metadata }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.domain = entry.domain;
    this.exitCode = entry.exitCode;
    this.isExpected = entry.isExpected;
    this.issues = opts.issues ?? [];
  }
}
