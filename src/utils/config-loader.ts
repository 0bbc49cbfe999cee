/**
 * Configuration resolution
 *
 * Precedence per setting: CLI flag > config file > environment > defaults.
 */

import type {
  MongoProbeConfig,
  ResolvedConfig,
  SamplingConfig,
  SourceConfig,
} from "../cli/config/types.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const CONFIG_DEFAULTS = {
  sampleSize: 100,
  strategy: "firstN",
  maxDepth: 100,
} as const;

/**
 * Settings given directly on the command line
 */
export interface CliOverrides {
  source?: SourceConfig;
  sampling?: SamplingConfig;
  maxDepth?: number;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Combine CLI overrides, a parsed config file and the environment
 *
 * @example
 * const config = resolveConfig(
 *   { sampling: { sampleSize: 20 } },
 *   { sampling: { sampleSize: 50, strategy: "random" } },
 *   { MONGODB_URI: "mongodb://localhost:27017" },
 * );
 * // sampleSize 20 (CLI), strategy "random" (file), uri from MONGODB_URI
 */
export function resolveConfig(
  cli: CliOverrides = {},
  file: MongoProbeConfig = {},
  env: Env = process.env,
): ResolvedConfig {
  const config: ResolvedConfig = {
    source: {
      uri: cli.source?.uri ?? file.source?.uri ?? nonEmpty(env.MONGODB_URI),
      database:
        cli.source?.database ?? file.source?.database ?? nonEmpty(env.MONGODB_DATABASE),
      collection: cli.source?.collection ?? file.source?.collection,
    },
    sampling: {
      sampleSize:
        cli.sampling?.sampleSize ?? file.sampling?.sampleSize ?? CONFIG_DEFAULTS.sampleSize,
      strategy: cli.sampling?.strategy ?? file.sampling?.strategy ?? CONFIG_DEFAULTS.strategy,
    },
    validation: {
      maxDepth: cli.maxDepth ?? file.validation?.maxDepth ?? CONFIG_DEFAULTS.maxDepth,
    },
  };

  validateResolvedConfig(config);

  logger.debug("Configuration resolved", {
    database: config.source.database,
    collection: config.source.collection,
    sampling: config.sampling,
    validation: config.validation,
  });

  return config;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * @throws ConfigError if a numeric setting is out of range
 */
export function validateResolvedConfig(config: ResolvedConfig): void {
  const { sampleSize } = config.sampling;
  if (!Number.isInteger(sampleSize) || sampleSize < 1) {
    throw new ConfigError(`Sample size must be a positive integer, got ${sampleSize}`);
  }
  const { maxDepth } = config.validation;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new ConfigError(`Max depth must be a positive integer, got ${maxDepth}`);
  }
}

/**
 * Connection settings a command cannot run without
 *
 * @throws ConfigError naming the flag or variable that supplies the missing value
 */
export function requireConnection(config: ResolvedConfig): { uri: string; database: string } {
  const { uri, database } = config.source;
  if (!uri) {
    throw new ConfigError(
      "Missing MongoDB URI: pass --uri, set source.uri in the config file, or set MONGODB_URI",
    );
  }
  if (!database) {
    throw new ConfigError(
      "Missing database name: pass --db, set source.database in the config file, or set MONGODB_DATABASE",
    );
  }
  return { uri, database };
}
