import { FlagConfiguration, flag, record } from "@flagcraft/core";

/** Mixed scalar fields with one aliased boolean. */
export const CompileFlags = record("CompileFlags", {
  color: flag.bool(),
  count: flag.int("uint"),
  maybe: flag.optional(flag.int("uint")),
  some_some: flag.bool(),
});

export const compileFlagsConfig = FlagConfiguration.empty().short("color", "c");

/** Booleans followed by a rest capture. */
export const RestOptions = record("RestOptions", {
  color: flag.bool(),
  verbose: flag.bool(),
  rest: flag.list(flag.string()),
});

/** Usage fixture: optional, mandatory, boolean and rest fields. */
export const MixedOptions = record("MixedOptions", {
  color: flag.optional(flag.string()),
  line_count: flag.string(),
  verbose: flag.bool(),
  rest: flag.list(flag.string()),
});

export const mixedOptionsConfig = FlagConfiguration.empty().short("verbose", "v");

/** One field per scalar kind, each with an alias. */
export const ScalarOptions = record("ScalarOptions", {
  name: flag.string(),
  level: flag.int("i32"),
  ratio: flag.float(),
  initial: flag.char(),
});

export const scalarOptionsConfig = FlagConfiguration.empty()
  .short("name", "n")
  .short("level", "l")
  .short("ratio", "r")
  .short("initial", "i");

/** Invalid: a field declared after the rest field. */
export const FieldAfterRest = record("FieldAfterRest", {
  rest: flag.list(flag.string()),
  verbose: flag.bool(),
});
