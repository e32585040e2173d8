import { FlagConfiguration } from "./configuration.js";
import { logWarn } from "./log.js";
import type { RecordShape } from "./shapes.js";

const LOG_TAG = "flagcraft:registry";

/**
 * Explicit table of flag configurations keyed by record declaration.
 * Configure each record once at start-up, then pass the registry to the
 * decode and usage entry points.
 */
export class FlagConfigRegistry {
  private readonly configs = new Map<RecordShape<unknown>, FlagConfiguration>();

  configure<T>(
    record: RecordShape<T>,
    build: (config: FlagConfiguration) => FlagConfiguration,
  ): this {
    if (this.configs.has(record)) {
      logWarn(LOG_TAG, `record "${record.name}" was already configured; replacing`);
    }
    this.configs.set(record, build(FlagConfiguration.empty()));
    return this;
  }

  /** The registered configuration, or an empty one. */
  configFor<T>(record: RecordShape<T>): FlagConfiguration {
    return this.configs.get(record) ?? FlagConfiguration.empty();
  }

  has<T>(record: RecordShape<T>): boolean {
    return this.configs.has(record);
  }
}

/** Where a decode or usage pass finds its record's configuration. */
export interface ConfigurationSource {
  /** Takes precedence over `registry` */
  readonly config?: FlagConfiguration | undefined;
  readonly registry?: FlagConfigRegistry | undefined;
}

export function resolveConfiguration<T>(
  record: RecordShape<T>,
  source: ConfigurationSource = {},
): FlagConfiguration {
  return source.config ?? source.registry?.configFor(record) ?? FlagConfiguration.empty();
}
