/**
 * Sampler module - MongoDB connection and document sampling strategies
 */

export * from "./types.js";
export * from "./connector.js";
export * from "./strategies.js";
