/**
 * Query operator tables
 * See: https://www.mongodb.com/docs/manual/reference/operator/query/
 */

import { NUMERIC_TYPE_TAGS, type TypeTag } from "../../types/data-model.js";

export const OPERATOR_SIGIL = "$";

export const QUERY_OPERATOR_GROUPS = Object.freeze({
  comparison: ["$eq", "$gt", "$gte", "$in", "$lt", "$lte", "$ne", "$nin"],
  logical: ["$and", "$or", "$not", "$nor"],
  element: ["$exists", "$type"],
  evaluation: [
    "$expr",
    "$jsonSchema",
    "$mod",
    "$regex",
    "$options",
    "$text",
    "$where",
    "$search",
  ],
  geospatial: [
    "$geoIntersects",
    "$geoWithin",
    "$near",
    "$nearSphere",
    "$box",
    "$center",
    "$centerSphere",
    "$geometry",
    "$maxDistance",
    "$minDistance",
    "$polygon",
  ],
  array: ["$all", "$elemMatch", "$size"],
  bitwise: ["$bitsAllClear", "$bitsAllSet", "$bitsAnyClear", "$bitsAnySet"],
  comments: ["$comment"],
} as const);

export type QueryOperator =
  (typeof QUERY_OPERATOR_GROUPS)[keyof typeof QUERY_OPERATOR_GROUPS][number];

export const KNOWN_QUERY_OPERATORS: ReadonlySet<string> = new Set<string>(
  Object.values(QUERY_OPERATOR_GROUPS).flat(),
);

/** Operators whose value is an array of complete sub-filters */
export const LOGICAL_ARRAY_OPERATORS: ReadonlySet<string> = new Set<string>([
  "$and",
  "$or",
  "$nor",
]);

export const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<string>([
  "$eq",
  "$ne",
  "$gt",
  "$gte",
  "$lt",
  "$lte",
]);

export function isOperatorKey(key: string): boolean {
  return key.startsWith(OPERATOR_SIGIL);
}

export function isKnownOperator(key: string): key is QueryOperator {
  return KNOWN_QUERY_OPERATORS.has(key);
}

/**
 * `$type` aliases and numeric codes → the tags they select
 */
const TYPE_SPECS: ReadonlyArray<readonly [string, number, readonly TypeTag[]]> = [
  ["double", 1, ["double"]],
  ["string", 2, ["string"]],
  ["object", 3, ["object", "dbRef"]],
  ["array", 4, ["array"]],
  ["binData", 5, ["binData"]],
  ["undefined", 6, ["null"]],
  ["objectId", 7, ["objectId"]],
  ["bool", 8, ["bool"]],
  ["date", 9, ["date"]],
  ["null", 10, ["null"]],
  ["regex", 11, ["regex"]],
  ["dbPointer", 12, ["dbRef"]],
  ["javascript", 13, ["javascript"]],
  ["symbol", 14, []],
  ["javascriptWithScope", 15, ["javascript"]],
  ["int", 16, ["int"]],
  ["timestamp", 17, ["timestamp"]],
  ["long", 18, ["long"]],
  ["decimal", 19, ["decimal"]],
  ["minKey", -1, ["minKey"]],
  ["maxKey", 127, ["maxKey"]],
];

const TYPE_SPEC_LOOKUP: ReadonlyMap<string | number, readonly TypeTag[]> = new Map<
  string | number,
  readonly TypeTag[]
>([
  ...TYPE_SPECS.map(([alias, , tags]) => [alias, tags] as const),
  ...TYPE_SPECS.map(([, code, tags]) => [code, tags] as const),
  ["number", [...NUMERIC_TYPE_TAGS]],
]);

/**
 * Tags selected by a `$type` argument; undefined for an unrecognised alias or code
 */
export function resolveTypeSpec(spec: string | number): readonly TypeTag[] | undefined {
  return TYPE_SPEC_LOOKUP.get(spec);
}
