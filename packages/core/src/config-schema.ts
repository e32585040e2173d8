/**
 * Zod schema for declarative flag configuration, e.g. loaded from JSON:
 *
 *   { "short": { "verbose": "v" }, "description": "...", "restField": "files" }
 */

import { FlagConfigurationError, type ValidationIssue } from "@flagcraft/errors";
import { z } from "zod";

import { FlagConfiguration } from "./configuration.js";

/** Field names as written in a record declaration */
const FieldNameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Must be a valid field name");

const AliasSchema = z
  .string()
  .refine((alias) => [...alias].length === 1, { message: "Alias must be a single character" })
  .refine((alias) => alias !== "-", { message: "Alias cannot be '-'" });

export const FlagConfigurationSchema = z
  .object({
    short: z.record(FieldNameSchema, AliasSchema).optional(),
    description: z.string().optional(),
    restField: FieldNameSchema.optional(),
  })
  .strict();

export type FlagConfigurationInput = z.infer<typeof FlagConfigurationSchema>;

/**
 * Builds a FlagConfiguration from an untrusted object.
 *
 * @throws FlagConfigurationError with one issue per schema violation
 */
export function parseFlagConfiguration(input: unknown): FlagConfiguration {
  const result = FlagConfigurationSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
      code: issue.code,
    }));
    throw new FlagConfigurationError(issues, result.error);
  }

  const { short = {}, description, restField } = result.data;
  let config = FlagConfiguration.empty();
  for (const [field, alias] of Object.entries(short)) {
    config = config.short(field, alias);
  }
  if (description !== undefined) config = config.desc(description);
  if (restField !== undefined) config = config.restField(restField);
  return config;
}
