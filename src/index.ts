/**
 * mongoprobe: schema inference for MongoDB collections and query filter validation
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/classifier/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/snapshot/index.js";
export * from "./lib/sampler/index.js";
export * from "./lib/executor/index.js";
export * from "./lib/toolkit/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
