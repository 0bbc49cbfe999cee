/**
 * SchemaNode construction and structural guards
 */

import {
  isTypeTag,
  type SchemaNode,
  type TypeTag,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";

/**
 * Build a node, leaving out absent children so equality checks stay structural
 */
export function createSchemaNode(
  types: Iterable<TypeTag>,
  objectSchema?: ReadonlyMap<string, SchemaNode>,
  elementSchema?: SchemaNode,
): SchemaNode {
  return {
    types: new Set(types),
    ...(objectSchema !== undefined ? { objectSchema } : {}),
    ...(elementSchema !== undefined ? { elementSchema } : {}),
  };
}

export function primitiveNode(tag: TypeTag): SchemaNode {
  return createSchemaNode([tag]);
}

/**
 * Element placeholder for an array observed only empty
 */
export function emptyArrayElementNode(): SchemaNode {
  return primitiveNode("empty_array");
}

export function unknownNode(): SchemaNode {
  return primitiveNode("unknown");
}

/**
 * Shallow structural check: a Set of known tags plus correctly shaped child slots.
 * Children are checked when a merge reaches them.
 */
export function isSchemaNode(value: unknown): value is SchemaNode {
  if (typeof value !== "object" || value === null || !("types" in value)) {
    return false;
  }
  const { types } = value;
  if (!(types instanceof Set)) {
    return false;
  }
  for (const tag of types) {
    if (!isTypeTag(tag)) {
      return false;
    }
  }
  if ("objectSchema" in value && value.objectSchema !== undefined) {
    if (!(value.objectSchema instanceof Map)) {
      return false;
    }
  }
  if ("elementSchema" in value && value.elementSchema !== undefined) {
    if (typeof value.elementSchema !== "object" || value.elementSchema === null) {
      return false;
    }
  }
  return true;
}

export function isObjectSchemaMap(
  value: unknown,
): value is ReadonlyMap<string, unknown> {
  return value instanceof Map;
}

/**
 * Record a non-fatal anomaly in the caller's diagnostics list and the log
 */
export function recordDiagnostic(
  diagnostics: string[] | undefined,
  message: string,
): void {
  diagnostics?.push(message);
  logger.warn(message);
}
