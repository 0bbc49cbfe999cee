/**
 * Schema node merging
 *
 * `mergeSchemaNodes` is commutative, associative and idempotent over valid
 * nodes, and total over anything else: an invalid side is dropped with a
 * diagnostic, and two invalid sides collapse to an `unknown` placeholder.
 */

import type { SchemaNode, TypeTag } from "../../types/data-model.js";
import {
  createSchemaNode,
  isObjectSchemaMap,
  isSchemaNode,
  recordDiagnostic,
  unknownNode,
} from "./schema-node.js";

function describe(path: string): string {
  return path === "" ? "<root>" : `'${path}'`;
}

function childPath(path: string, key: string): string {
  return path === "" ? key : `${path}.${key}`;
}

/**
 * Merge two schema fragments into a new node; inputs are left untouched
 */
export function mergeSchemaNodes(
  a: unknown,
  b: unknown,
  diagnostics?: string[],
  path = "",
): SchemaNode {
  if (!isSchemaNode(a)) {
    if (isSchemaNode(b)) {
      recordDiagnostic(
        diagnostics,
        `Invalid existing schema at ${describe(path)}; keeping the new schema.`,
      );
      return b;
    }
    recordDiagnostic(
      diagnostics,
      `Neither side of the schema merge at ${describe(path)} is a valid schema node; using 'unknown'.`,
    );
    return unknownNode();
  }
  if (!isSchemaNode(b)) {
    recordDiagnostic(
      diagnostics,
      `Invalid new schema at ${describe(path)}; keeping the existing schema.`,
    );
    return a;
  }
  if (a === b) {
    return a;
  }

  const types = new Set<TypeTag>([...a.types, ...b.types]);
  const objectSchema = mergeObjectSchemas(
    a.objectSchema,
    b.objectSchema,
    diagnostics,
    path,
  );
  const elementSchema = mergeElementSchemas(
    a.elementSchema,
    b.elementSchema,
    diagnostics,
    path,
  );

  return createSchemaNode(types, objectSchema, elementSchema);
}

/**
 * Key-wise merge of two object schemas; keys on one side only pass through
 */
export function mergeObjectSchemas(
  a: unknown,
  b: unknown,
  diagnostics?: string[],
  path = "",
): ReadonlyMap<string, SchemaNode> | undefined {
  const aValid = isObjectSchemaMap(a);
  const bValid = isObjectSchemaMap(b);

  if (!aValid && !bValid) {
    return undefined;
  }

  const merged = new Map<string, SchemaNode>();
  const keys = new Set<string>([
    ...(aValid ? a.keys() : []),
    ...(bValid ? b.keys() : []),
  ]);

  for (const key of keys) {
    const left = aValid ? a.get(key) : undefined;
    const right = bValid ? b.get(key) : undefined;
    const fieldPath = childPath(path, key);
    const leftValid = isSchemaNode(left);
    const rightValid = isSchemaNode(right);

    if (leftValid && rightValid) {
      merged.set(key, mergeSchemaNodes(left, right, diagnostics, fieldPath));
    } else if (leftValid) {
      if (right !== undefined) {
        recordDiagnostic(
          diagnostics,
          `Invalid schema for key '${fieldPath}' in nested schema merge; keeping the other side.`,
        );
      }
      merged.set(key, left);
    } else if (rightValid) {
      if (left !== undefined) {
        recordDiagnostic(
          diagnostics,
          `Invalid schema for key '${fieldPath}' in nested schema merge; keeping the other side.`,
        );
      }
      merged.set(key, right);
    } else {
      recordDiagnostic(
        diagnostics,
        `Invalid schema for key '${fieldPath}' on both sides of a nested schema merge; dropping it.`,
      );
    }
  }

  return merged;
}

/**
 * Merge two array element schemas, dropping the empty-array placeholder once
 * a real element type sits beside it
 */
export function mergeElementSchemas(
  a: unknown,
  b: unknown,
  diagnostics?: string[],
  path = "",
): SchemaNode | undefined {
  if (!isSchemaNode(a)) {
    if (a !== undefined) {
      recordDiagnostic(
        diagnostics,
        `Invalid element schema at ${describe(path)}; dropping it.`,
      );
    }
    if (isSchemaNode(b)) {
      return b;
    }
    if (b !== undefined) {
      recordDiagnostic(
        diagnostics,
        `Invalid element schema at ${describe(path)}; dropping it.`,
      );
    }
    return undefined;
  }
  if (!isSchemaNode(b)) {
    if (b !== undefined) {
      recordDiagnostic(
        diagnostics,
        `Invalid element schema at ${describe(path)}; dropping it.`,
      );
    }
    return a;
  }

  return withoutEmptyArrayPlaceholder(
    mergeSchemaNodes(a, b, diagnostics, `${path}[]`),
  );
}

export function withoutEmptyArrayPlaceholder(node: SchemaNode): SchemaNode {
  if (!node.types.has("empty_array") || node.types.size < 2) {
    return node;
  }
  const types = [...node.types].filter((tag) => tag !== "empty_array");
  return createSchemaNode(types, node.objectSchema, node.elementSchema);
}

/**
 * Merge two collection-level schemas key by key
 */
export function mergeCollectionSchemas(
  a: ReadonlyMap<string, SchemaNode>,
  b: ReadonlyMap<string, SchemaNode>,
  diagnostics?: string[],
): ReadonlyMap<string, SchemaNode> {
  return mergeObjectSchemas(a, b, diagnostics) ?? new Map();
}
