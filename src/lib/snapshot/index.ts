/**
 * Snapshot module - JSON codec and file persistence for schema snapshots
 */

export * from "./codec.js";
export * from "./loader.js";
