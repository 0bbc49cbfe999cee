/**
 * CLI configuration types
 */

import type { SortSpec } from "../../lib/executor/index.js";
import type { SamplingStrategyName } from "../../lib/sampler/index.js";
import type { LogLevel } from "../../utils/logger.js";

/**
 * Source MongoDB connection configuration
 */
export interface SourceConfig {
  uri?: string;
  database?: string;
  collection?: string;
}

export interface SamplingConfig {
  sampleSize?: number;
  strategy?: SamplingStrategyName;
}

export interface ValidationSettings {
  maxDepth?: number;
}

/**
 * Complete configuration file structure
 */
export interface MongoProbeConfig {
  source?: SourceConfig;
  sampling?: SamplingConfig;
  validation?: ValidationSettings;
}

/**
 * Configuration after CLI flags, file, environment and defaults are combined
 */
export interface ResolvedConfig {
  source: {
    uri?: string;
    database?: string;
    collection?: string;
  };
  sampling: {
    sampleSize: number;
    strategy: SamplingStrategyName;
  };
  validation: {
    maxDepth: number;
  };
}

/**
 * Options shared by every command (from commander)
 */
export interface CommonCommandOptions {
  config?: string;
  logLevel?: LogLevel;
}

export interface ConnectionCommandOptions extends CommonCommandOptions {
  uri?: string;
  db?: string;
}

export interface QueryInputOptions {
  query?: string;
  queryFile?: string;
  ejson?: boolean;
}

export interface InferCommandOptions extends ConnectionCommandOptions {
  collection?: string;
  sampleSize?: number;
  strategy?: SamplingStrategyName;
  maxDepth?: number;
  output?: string;
}

export type OutputFormat = "json" | "text";

export interface ValidateSyntaxCommandOptions extends CommonCommandOptions, QueryInputOptions {
  maxDepth?: number;
  format?: OutputFormat;
}

export interface ValidateCommandOptions extends ConnectionCommandOptions, QueryInputOptions {
  collection?: string;
  schema?: string;
  sampleSize?: number;
  strategy?: SamplingStrategyName;
  maxDepth?: number;
  format?: OutputFormat;
}

export interface QueryCommandOptions extends ConnectionCommandOptions, QueryInputOptions {
  collection?: string;
  projection?: string;
  sort?: SortSpec[];
  limit?: number;
  skip?: number;
}
