/**
 * Snapshot codec - converts schema snapshots to and from their JSON form
 */

import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import {
  TYPE_TAGS,
  type CollectionSchema,
  type DatabaseSchema,
  type SchemaNode,
  type SerializedCollectionSchema,
  type SerializedDatabaseSchema,
  type SerializedSchemaNode,
} from "../../types/data-model.js";
import { createSchemaNode } from "../inferencer/schema-node.js";
import { SchemaError } from "../../utils/errors.js";

const Ajv = AjvModule.default;

const NODE_SCHEMA_ID = "mongoprobe://schema-node";

const serializedNodeSchema = {
  $id: NODE_SCHEMA_ID,
  type: "object",
  required: ["types"],
  additionalProperties: false,
  properties: {
    types: {
      type: "array",
      items: { type: "string", enum: [...TYPE_TAGS] },
      uniqueItems: true,
    },
    objectSchema: {
      type: "object",
      additionalProperties: { $ref: "#" },
    },
    elementSchema: { $ref: "#" },
  },
};

const serializedCollectionSchema = {
  type: "object",
  additionalProperties: { $ref: NODE_SCHEMA_ID },
};

const serializedDatabaseSchema = {
  type: "object",
  additionalProperties: serializedCollectionSchema,
};

const ajv = new Ajv({ allErrors: true });
ajv.addSchema(serializedNodeSchema);

const validateCollection: ValidateFunction<SerializedCollectionSchema> =
  ajv.compile<SerializedCollectionSchema>(serializedCollectionSchema);
const validateDatabase: ValidateFunction<SerializedDatabaseSchema> =
  ajv.compile<SerializedDatabaseSchema>(serializedDatabaseSchema);

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
  );
}

export function serializeSchemaNode(node: SchemaNode): SerializedSchemaNode {
  const serialized: SerializedSchemaNode = { types: [...node.types].sort() };
  if (node.objectSchema !== undefined) {
    serialized.objectSchema = serializeCollectionSchema(node.objectSchema);
  }
  if (node.elementSchema !== undefined) {
    serialized.elementSchema = serializeSchemaNode(node.elementSchema);
  }
  return serialized;
}

/**
 * JSON-ready form of a collection schema: `types` as sorted lists, children nested
 */
export function serializeCollectionSchema(
  schema: CollectionSchema,
): SerializedCollectionSchema {
  // fromEntries defines own keys, so a field named "__proto__" survives
  return Object.fromEntries(
    [...schema].map(([field, node]): [string, SerializedSchemaNode] => [
      field,
      serializeSchemaNode(node),
    ]),
  );
}

export function serializeDatabaseSchema(
  schema: DatabaseSchema,
): SerializedDatabaseSchema {
  return Object.fromEntries(
    Object.entries(schema).map(([collection, collectionSchema]): [string, SerializedCollectionSchema] => [
      collection,
      serializeCollectionSchema(collectionSchema),
    ]),
  );
}

function toSchemaNode(serialized: SerializedSchemaNode): SchemaNode {
  return createSchemaNode(
    serialized.types,
    serialized.objectSchema !== undefined
      ? toCollectionSchema(serialized.objectSchema)
      : undefined,
    serialized.elementSchema !== undefined
      ? toSchemaNode(serialized.elementSchema)
      : undefined,
  );
}

function toCollectionSchema(
  serialized: SerializedCollectionSchema,
): CollectionSchema {
  const schema = new Map<string, SchemaNode>();
  for (const [field, node] of Object.entries(serialized)) {
    schema.set(field, toSchemaNode(node));
  }
  return schema;
}

/**
 * Rebuild a collection schema from its JSON form
 *
 * @throws SchemaError when the input does not have the snapshot shape
 */
export function deserializeCollectionSchema(json: unknown): CollectionSchema {
  if (!validateCollection(json)) {
    throw new SchemaError("Invalid collection schema snapshot", {
      errors: formatAjvErrors(validateCollection.errors),
    });
  }
  return toCollectionSchema(json);
}

/**
 * Rebuild a database schema (collection name → collection schema) from JSON
 *
 * @throws SchemaError when the input does not have the snapshot shape
 */
export function deserializeDatabaseSchema(json: unknown): DatabaseSchema {
  if (!validateDatabase(json)) {
    throw new SchemaError("Invalid database schema snapshot", {
      errors: formatAjvErrors(validateDatabase.errors),
    });
  }
  return Object.fromEntries(
    Object.entries(json).map(([collection, serialized]): [string, CollectionSchema] => [
      collection,
      toCollectionSchema(serialized),
    ]),
  );
}
