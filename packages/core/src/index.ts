/**
 * @flagcraft/core
 *
 * Record declarations, the field-traversal protocol, and per-record flag
 * configuration shared by the value and usage decoders.
 */

// ============================================================================
// RECORD DECLARATIONS
// ============================================================================

export {
  type FieldShapes,
  flag,
  type Infer,
  type InferFields,
  record,
  RecordShape,
  type Shape,
} from "./shapes.js";

export type {
  FloatKind,
  IntegerKind,
  NarrowIntegerKind,
  RecordVisitor,
  WideIntegerKind,
} from "./visitor.js";

// ============================================================================
// CONFIGURATION
// ============================================================================

export { DEFAULT_REST_FIELD, FlagConfiguration } from "./configuration.js";
export {
  FlagConfigurationSchema,
  type FlagConfigurationInput,
  parseFlagConfiguration,
} from "./config-schema.js";
export {
  type ConfigurationSource,
  FlagConfigRegistry,
  resolveConfiguration,
} from "./registry.js";

// ============================================================================
// RESOLUTION
// ============================================================================

export { canonicalFlagName, resolveFieldPosition, shortFlagName } from "./resolver.js";
export { TokenSequence } from "./token-sequence.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { logWarn } from "./log.js";

export const PACKAGE_NAME = "@flagcraft/core" as const;
