/**
 * @flagcraft/usage
 *
 * Usage text for declared records, built by walking the same declaration
 * the value decoder reads.
 */

export { renderUsage } from "./render.js";
export {
  type CollectedUsage,
  collectFieldUsage,
  type Usage,
  usage,
  type UsageOptions,
} from "./usage.js";
export { type FieldUsage, UsageDecoder } from "./usage-decoder.js";

export const PACKAGE_NAME = "@flagcraft/usage" as const;
