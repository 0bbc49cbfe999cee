/**
 * Classifier module - maps runtime values (BSON or plain JS) to type tags
 */

export * from "./type-classifier.js";
