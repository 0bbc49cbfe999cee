/**
 * Field path helpers over collection schemas
 */

import type { CollectionSchema, SchemaNode } from "../../types/data-model.js";

/**
 * Extract every nested object path from a collection schema (dot notation).
 * Object schemas inside array elements are not descended.
 * Example: { "user": node, "user.address": node, "user.address.city": node, "tags": node }
 */
export function extractFieldPaths(
  schema: CollectionSchema,
): Map<string, SchemaNode> {
  const paths = new Map<string, SchemaNode>();

  function traverse(fields: CollectionSchema, parentPath = ""): void {
    for (const [fieldName, node] of fields) {
      const currentPath = parentPath ? `${parentPath}.${fieldName}` : fieldName;
      paths.set(currentPath, node);

      if (node.objectSchema && node.objectSchema.size > 0) {
        traverse(node.objectSchema, currentPath);
      }
    }
  }

  traverse(schema);
  return paths;
}

/**
 * Paths of fields that were observed as arrays
 */
export function getArrayFieldPaths(schema: CollectionSchema): string[] {
  return [...extractFieldPaths(schema)]
    .filter(([, node]) => node.types.has("array"))
    .map(([path]) => path);
}
