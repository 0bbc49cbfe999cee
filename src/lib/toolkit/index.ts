/**
 * Toolkit module - database-bound facade over sampling, inference, validation and execution
 */

export * from "./types.js";
export { SchemaToolkit, DEFAULT_SAMPLE_SIZE } from "./schema-toolkit.js";
