import { FlagcraftError } from "../base.js";
import { ERROR_CATALOG, type CodesForBase, type ErrorDomain, type ExitCode } from "../catalog.js";
import type { FlagcraftErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs: a record declaration the protocol cannot walk,
 * or a broken invariant inside a decoder.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends FlagcraftError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly exitCode: ExitCode;
  override readonly isExpected: boolean;

  constructor(options: FlagcraftErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | FlagcraftErrorOptions<C>, metadata?: Record<string, string>) {
    const opts: FlagcraftErrorOptions<C> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR" as C, message: messageOrOptions, metadata }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.domain = entry.domain;
    this.exitCode = entry.exitCode;
    this.isExpected = entry.isExpected;
  }
}
