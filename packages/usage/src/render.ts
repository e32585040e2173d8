import type { FieldUsage } from "./usage-decoder.js";

const INDENT = "    ";

/**
 * One line per field, mandatory fields first, then optional ones in
 * `[...]`. Aliased fields start with `-x, `; when any field has an alias
 * (or `forceIndent` is set) the others are indented to line up.
 *
 *       --line-count
 *       [--color]
 *   -v, [--verbose]
 */
export function renderUsage(fields: readonly FieldUsage[], forceIndent = false): string {
  const hasAliases = fields.some((field) => field.alias !== undefined);
  const indent = forceIndent || hasAliases ? INDENT : "";

  const mandatory = fields.filter((field) => !field.optional);
  const optional = fields.filter((field) => field.optional);

  return [
    ...mandatory.map((field) => renderLine(field, indent, field.canonical)),
    ...optional.map((field) => renderLine(field, indent, `[${field.canonical}]`)),
  ].join("");
}

function renderLine(field: FieldUsage, indent: string, longhand: string): string {
  const shorthand = field.alias === undefined ? indent : `-${field.alias}, `;
  return `${shorthand}${longhand}\n`;
}
