/**
 * Executor module - runs find queries
 */

export * from "./types.js";
export { executeFindQuery } from "./find.js";
