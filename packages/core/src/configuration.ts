import { logWarn } from "./log.js";

export const DEFAULT_REST_FIELD = "rest";

const LOG_TAG = "flagcraft:config";

/**
 * Per-record flag metadata: short aliases, a description, and the name of
 * the field that receives leftover arguments.
 *
 * Immutable. Builder methods return a new configuration, so one value can
 * be shared by every decode pass for its record:
 *
 *   const config = FlagConfiguration.empty()
 *     .short("verbose", "v")
 *     .desc("Compile the given files")
 *     .restField("files");
 */
export class FlagConfiguration {
  private constructor(
    private readonly aliases: ReadonlyMap<string, string>,
    private readonly text: string | undefined,
    private readonly rest: string,
  ) {}

  static empty(): FlagConfiguration {
    return new FlagConfiguration(new Map(), undefined, DEFAULT_REST_FIELD);
  }

  /**
   * Register `-<alias>` as a short form of `field`. Re-registering a field
   * replaces its alias. An alias shared by two fields, or one that is not a
   * single character, is registered but logged; `parseFlagConfiguration`
   * is the path that rejects malformed aliases.
   */
  short(field: string, alias: string): FlagConfiguration {
    if ([...alias].length !== 1) {
      logWarn(LOG_TAG, `alias "${alias}" for "${field}" is not a single character`);
    }
    for (const [other, existing] of this.aliases) {
      if (existing === alias && other !== field) {
        logWarn(LOG_TAG, `alias -${alias} is registered for both "${other}" and "${field}"`);
      }
    }
    const aliases = new Map(this.aliases);
    aliases.set(field, alias);
    return new FlagConfiguration(aliases, this.text, this.rest);
  }

  desc(text: string): FlagConfiguration {
    return new FlagConfiguration(this.aliases, text, this.rest);
  }

  restField(field: string): FlagConfiguration {
    return new FlagConfiguration(this.aliases, this.text, field);
  }

  shortFor(field: string): string | undefined {
    return this.aliases.get(field);
  }

  description(): string | undefined {
    return this.text;
  }

  restFieldName(): string {
    return this.rest;
  }

  /** Aliases in registration order. */
  shortAliases(): ReadonlyArray<readonly [field: string, alias: string]> {
    return [...this.aliases];
  }
}
