/**
 * Sampling strategies for MongoDB collections
 */

import type { Document, FindOptions } from "mongodb";
import type { SampleDocument } from "../../types/data-model.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { SamplingStrategyName } from "./types.js";

/**
 * Cursor surface the strategies consume; driver find and aggregation cursors satisfy it
 */
export interface DocumentCursor extends AsyncIterable<SampleDocument> {
  toArray(): Promise<SampleDocument[]>;
}

/**
 * The part of a driver collection the strategies read through
 */
export interface SampleSource {
  readonly collectionName: string;
  find(filter: Document, options: FindOptions): DocumentCursor;
  aggregate(pipeline: Document[]): DocumentCursor;
}

export interface SamplingStrategy {
  readonly name: SamplingStrategyName;
  sample(collection: SampleSource, size: number): Promise<SampleDocument[]>;
  sampleStream(collection: SampleSource, size: number): AsyncIterable<SampleDocument>;
}

/**
 * Random sampling using the $sample aggregation stage
 */
export class RandomSamplingStrategy implements SamplingStrategy {
  readonly name = "random";

  async sample(collection: SampleSource, size: number): Promise<SampleDocument[]> {
    logger.debug("Executing random sampling strategy", {
      collection: collection.collectionName,
      size,
    });
    return collection.aggregate([{ $sample: { size } }]).toArray();
  }

  async *sampleStream(collection: SampleSource, size: number): AsyncIterable<SampleDocument> {
    logger.debug("Executing random sampling stream strategy", { size });
    yield* collection.aggregate([{ $sample: { size } }]);
  }
}

/**
 * First-N sampling (reads the first N documents in natural order)
 */
export class FirstNSamplingStrategy implements SamplingStrategy {
  readonly name = "firstN";

  async sample(collection: SampleSource, size: number): Promise<SampleDocument[]> {
    logger.debug("Executing first-N sampling strategy", {
      collection: collection.collectionName,
      size,
    });
    return collection.find({}, { limit: size }).toArray();
  }

  async *sampleStream(collection: SampleSource, size: number): AsyncIterable<SampleDocument> {
    logger.debug("Executing first-N sampling stream strategy", { size });
    yield* collection.find({}, { limit: size });
  }
}

export function createStrategy(strategyName: string): SamplingStrategy {
  switch (strategyName) {
    case "random":
      return new RandomSamplingStrategy();
    case "firstN":
      return new FirstNSamplingStrategy();
    default:
      throw new ConfigError("Unknown sampling strategy: " + strategyName, {
        strategy: strategyName,
      });
  }
}
