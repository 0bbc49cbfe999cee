/**
 * Shared types
 */

export * from "./data-model.js";
