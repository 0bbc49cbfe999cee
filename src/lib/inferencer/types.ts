/**
 * Inferencer module types
 */

import type { CollectionSchema } from "../../types/data-model.js";

export interface InferOptions {
  /** Deepest nesting level inferred before values are recorded as `unknown` */
  maxDepth?: number;
  /** Sink for non-fatal anomalies found while inferring */
  diagnostics?: string[];
}

export interface AggregateOptions {
  maxDepth?: number;
}

export interface AggregationResult {
  schema: CollectionSchema;
  diagnostics: string[];
  documentsAnalyzed: number;
  documentsSkipped: number;
}
