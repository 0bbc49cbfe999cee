/**
 * Core data model types for mongoprobe
 * These structures flow through the pipeline: sampling → inference → merge → snapshot → query validation
 */

import type { Document } from "mongodb";

/**
 * TypeTag - closed set of value categories assigned by the classifier
 */
export const TYPE_TAGS = [
  "string",
  "bool",
  "int",
  "long",
  "double",
  "decimal",
  "array",
  "object",
  "objectId",
  "dbRef",
  "timestamp",
  "null",
  "minKey",
  "maxKey",
  "binData",
  "javascript",
  "regex",
  "date",
  "empty_array",
  "unknown",
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === "string" && TYPE_TAGS.some((tag) => tag === value);
}

/**
 * Numeric tags are interchangeable when checking query values against a schema
 */
export const NUMERIC_TYPE_TAGS: ReadonlySet<TypeTag> = new Set<TypeTag>([
  "int",
  "long",
  "double",
  "decimal",
]);

/**
 * SchemaNode - inferred description of the values seen at one document position
 *
 * `objectSchema` is present iff `types` has "object"; `elementSchema` iff it has "array".
 * Nodes are never mutated once built.
 */
export interface SchemaNode {
  readonly types: ReadonlySet<TypeTag>;
  readonly objectSchema?: ReadonlyMap<string, SchemaNode>;
  readonly elementSchema?: SchemaNode;
}

/**
 * CollectionSchema - top-level field name → node; the document root is implicit
 */
export type CollectionSchema = ReadonlyMap<string, SchemaNode>;

/**
 * DatabaseSchema - collection name → collection schema
 */
export type DatabaseSchema = Record<string, CollectionSchema>;

/**
 * JSON form of a SchemaNode, used for storage and display
 */
export interface SerializedSchemaNode {
  types: TypeTag[];
  objectSchema?: Record<string, SerializedSchemaNode>;
  elementSchema?: SerializedSchemaNode;
}

export type SerializedCollectionSchema = Record<string, SerializedSchemaNode>;

export type SerializedDatabaseSchema = Record<string, SerializedCollectionSchema>;

/**
 * SampleDocument - raw document retrieved from MongoDB during discovery
 */
export type SampleDocument = Document;

/**
 * Outcome of a query validation, as handed to tool callers
 */
export interface ValidationOutcome {
  valid: boolean;
  errors: string[];
}
