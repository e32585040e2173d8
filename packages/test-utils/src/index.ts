export const PACKAGE_NAME = "@flagcraft/test-utils" as const;

export { spyOnWarnings } from "./console.js";
export {
  CompileFlags,
  compileFlagsConfig,
  FieldAfterRest,
  MixedOptions,
  mixedOptionsConfig,
  RestOptions,
  ScalarOptions,
  scalarOptionsConfig,
} from "./records.js";
export { RecordingVisitor } from "./visitor.js";
