/**
 * Toolkit types
 */

import type { SampleSource, SamplingStrategyName } from "../sampler/index.js";

export interface ToolkitConfig {
  uri: string;
  database: string;
  /** Documents sampled per collection when none is requested (default 100) */
  sampleSize?: number;
  strategy?: SamplingStrategyName;
  /** Nesting limit shared by inference and query validation (default 100) */
  maxDepth?: number;
}

/**
 * Database handle the toolkit works through; `MongoConnector` is the production one
 */
export interface DataSource {
  listCollectionNames(): Promise<string[]>;
  getCollection(name: string): SampleSource;
  close(): Promise<void>;
}

export interface SchemaRequest {
  collection?: string;
  sampleSize?: number;
}
