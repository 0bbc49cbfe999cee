/**
 * BSON-aware value classification
 *
 * Wrapper classes from the bson library carry a `_bsontype` marker; matching on
 * the marker instead of `instanceof` keeps values created by another copy of
 * the library classifiable.
 */

import type { TypeTag } from "../../types/data-model.js";

/**
 * A plain key/value container (not an array, not a BSON or builtin wrapper)
 */
export type PlainDocument = Record<string, unknown>;

/**
 * Read the bson `_bsontype` marker of a value, if it has one
 */
export function bsonTypeOf(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("_bsontype" in value)) {
    return undefined;
  }
  return typeof value._bsontype === "string" ? value._bsontype : undefined;
}

export function isPlainDocument(value: unknown): value is PlainDocument {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  if (bsonTypeOf(value) !== undefined) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isBinaryValue(value: unknown): boolean {
  return (
    value instanceof Uint8Array ||
    value instanceof ArrayBuffer ||
    bsonTypeOf(value) === "Binary"
  );
}

export function isRegexLike(value: unknown): boolean {
  return value instanceof RegExp || bsonTypeOf(value) === "BSONRegExp";
}

/**
 * Integers as the classifier sees them: JS integral numbers, bigint, Int32 and Long
 */
export function isIntegerValue(value: unknown): boolean {
  const tag = classifyValue(value);
  return tag === "int" || tag === "long";
}

export function isNumericValue(value: unknown): boolean {
  const tag = classifyValue(value);
  return tag === "int" || tag === "long" || tag === "double" || tag === "decimal";
}

const WRAPPER_TAGS: ReadonlyMap<string, TypeTag> = new Map<string, TypeTag>([
  ["ObjectId", "objectId"],
  ["ObjectID", "objectId"],
  ["DBRef", "dbRef"],
  ["Timestamp", "timestamp"],
  ["MinKey", "minKey"],
  ["MaxKey", "maxKey"],
  ["Code", "javascript"],
  ["BSONRegExp", "regex"],
]);

/**
 * Assign exactly one type tag to any value.
 *
 * The check order is significant: booleans before numbers, 64-bit integers
 * before plain integers, binary before generic arrays, plain documents before
 * the remaining wrapper types.
 */
export function classifyValue(value: unknown): TypeTag {
  if (typeof value === "string") return "string";
  if (typeof value === "boolean") return "bool";

  const bsonType = bsonTypeOf(value);

  if (typeof value === "bigint" || bsonType === "Long") return "long";
  if (bsonType === "Int32") return "int";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "int" : "double";
  }
  if (bsonType === "Double") return "double";
  if (bsonType === "Decimal128") return "decimal";

  if (isBinaryValue(value)) return "binData";
  if (Array.isArray(value)) return "array";
  if (isPlainDocument(value)) return "object";

  if (bsonType !== undefined) {
    const wrapperTag = WRAPPER_TAGS.get(bsonType);
    if (wrapperTag) return wrapperTag;
  }
  if (value instanceof RegExp) return "regex";
  if (value instanceof Date) return "date";

  if (value === null || value === undefined) return "null";

  return "unknown";
}
