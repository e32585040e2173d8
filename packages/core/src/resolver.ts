/**
 * Field name → token resolution.
 *
 * Every read that looks for a field's flag goes through
 * `resolveFieldPosition`, so the long form and the alias form behave the
 * same for booleans, values and optionals.
 */

import type { FlagConfiguration } from "./configuration.js";
import type { TokenSequence } from "./token-sequence.js";

/** `line_count` → `--line-count` */
export function canonicalFlagName(field: string): string {
  return `--${field.replaceAll("_", "-")}`;
}

/** `v` → `-v` */
export function shortFlagName(alias: string): string {
  return `-${alias}`;
}

/**
 * Position of the token naming `field`: the canonical long form first,
 * then the registered alias. `undefined` when neither is present.
 */
export function resolveFieldPosition(
  tokens: TokenSequence,
  field: string,
  config: FlagConfiguration,
): number | undefined {
  const long = tokens.indexOf(canonicalFlagName(field));
  if (long !== undefined) return long;

  const alias = config.shortFor(field);
  return alias === undefined ? undefined : tokens.indexOf(shortFlagName(alias));
}
