/**
 * Recursive value → SchemaNode inference
 */

import type { SchemaNode } from "../../types/data-model.js";
import { classifyValue, isPlainDocument } from "../classifier/index.js";
import { mergeSchemaNodes } from "./merge.js";
import {
  createSchemaNode,
  emptyArrayElementNode,
  primitiveNode,
  recordDiagnostic,
  unknownNode,
} from "./schema-node.js";
import type { InferOptions } from "./types.js";

export const DEFAULT_MAX_DEPTH = 100;

/**
 * Infer the schema fragment describing a single value.
 *
 * Objects recurse per key; arrays fold the schemas of their elements with
 * `mergeSchemaNodes`, and an empty array gets the `empty_array` element
 * placeholder. Nesting beyond `maxDepth` is cut off as `unknown`.
 *
 * @example
 * ```typescript
 * inferValueSchema({ tags: ["a", 1] });
 * // { types: {object}, objectSchema: { tags: { types: {array}, elementSchema: { types: {string, int} } } } }
 * ```
 */
export function inferValueSchema(
  value: unknown,
  options: InferOptions = {},
): SchemaNode {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  return inferAt(value, "", 0, maxDepth, options.diagnostics);
}

function inferAt(
  value: unknown,
  path: string,
  depth: number,
  maxDepth: number,
  diagnostics: string[] | undefined,
): SchemaNode {
  if (depth > maxDepth) {
    recordDiagnostic(
      diagnostics,
      `Nesting at '${path}' exceeds the maximum depth of ${maxDepth}; recording it as 'unknown'.`,
    );
    return unknownNode();
  }

  const tag = classifyValue(value);

  if (tag === "object" && isPlainDocument(value)) {
    const fields = new Map<string, SchemaNode>();
    for (const [key, child] of Object.entries(value)) {
      const childPath = path ? `${path}.${key}` : key;
      fields.set(key, inferAt(child, childPath, depth + 1, maxDepth, diagnostics));
    }
    return createSchemaNode(["object"], fields);
  }

  if (tag === "array" && Array.isArray(value)) {
    if (value.length === 0) {
      return createSchemaNode(["array"], undefined, emptyArrayElementNode());
    }

    let elementSchema: SchemaNode | undefined;
    for (const [index, item] of value.entries()) {
      const itemSchema = inferAt(
        item,
        `${path}[${index}]`,
        depth + 1,
        maxDepth,
        diagnostics,
      );
      elementSchema =
        elementSchema === undefined
          ? itemSchema
          : mergeSchemaNodes(elementSchema, itemSchema, diagnostics, `${path}[]`);
    }

    return createSchemaNode(["array"], undefined, elementSchema ?? unknownNode());
  }

  return primitiveNode(tag);
}
