/**
 * Inferencer module - schema inference and merging over sampled documents
 */

export * from "./types.js";
export * from "./schema-node.js";
export * from "./merge.js";
export * from "./schema-inferrer.js";
export * from "./aggregator.js";
export * from "./field-paths.js";
