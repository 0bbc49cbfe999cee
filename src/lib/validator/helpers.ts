/**
 * Shared helpers for the query validators
 */

import { NUMERIC_TYPE_TAGS, type TypeTag } from "../../types/data-model.js";
import { isOperatorKey } from "./operators.js";

export const DEFAULT_MAX_QUERY_DEPTH = 100;

export function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

/**
 * Whether a query value of type `tag` can match a field whose observed types are `allowed`.
 *
 * Two relaxations apply: `null` matches when the field was seen as null, and the
 * numeric tags (int, long, double, decimal) stand in for each other whenever the
 * field was seen with any numeric type.
 */
export function isTypeCompatible(
  tag: TypeTag,
  allowed: ReadonlySet<TypeTag>,
): boolean {
  if (allowed.has(tag)) {
    return true;
  }
  if (tag === "null") {
    return allowed.has("null");
  }
  if (NUMERIC_TYPE_TAGS.has(tag)) {
    return [...allowed].some((t) => NUMERIC_TYPE_TAGS.has(t));
  }
  return false;
}

export function formatTypes(types: Iterable<TypeTag>): string {
  return `[${[...types].sort().join(", ")}]`;
}

export interface KeyMix {
  operators: string[];
  fields: string[];
}

export function partitionKeys(keys: readonly string[]): KeyMix {
  return {
    operators: keys.filter((k) => isOperatorKey(k)),
    fields: keys.filter((k) => !isOperatorKey(k)),
  };
}

export function mixedKeysMessage(path: string, mix: KeyMix): string {
  return `Invalid query structure at '${path}': Cannot mix operators (like '${mix.operators[0]}') and field names (like '${mix.fields[0]}') at the same level within a field's value.`;
}

export function depthExceededMessage(path: string, maxDepth: number): string {
  return `Query nesting at '${path}' exceeds the maximum depth of ${maxDepth}.`;
}
