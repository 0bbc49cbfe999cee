/**
 * Schema-aware validation of query filter documents
 *
 * Resolves dotted field paths through an inferred collection schema and checks
 * query values and operator arguments against the types observed for each field.
 */

import type { SchemaNode, TypeTag } from "../../types/data-model.js";
import {
  classifyValue,
  isIntegerValue,
  isNumericValue,
  isPlainDocument,
  isRegexLike,
  type PlainDocument,
} from "../classifier/index.js";
import { isObjectSchemaMap, isSchemaNode } from "../inferencer/schema-node.js";
import {
  DEFAULT_MAX_QUERY_DEPTH,
  depthExceededMessage,
  formatTypes,
  isTypeCompatible,
  joinPath,
  mixedKeysMessage,
  partitionKeys,
} from "./helpers.js";
import {
  COMPARISON_OPERATORS,
  isKnownOperator,
  isOperatorKey,
  LOGICAL_ARRAY_OPERATORS,
  resolveTypeSpec,
} from "./operators.js";
import type { QueryValidationOptions } from "./types.js";

type FieldMap = ReadonlyMap<string, unknown>;

interface SchemaContext {
  errors: string[];
  maxDepth: number;
}

function invalidValue(op: string, path: string, expected: string): string {
  return `Invalid value for operator '${op}' at '${path}': ${expected}`;
}

/**
 * Validate a filter document against a collection schema snapshot.
 *
 * Logical operators re-validate each branch against the schema in scope;
 * field keys resolve segment by segment through nested object schemas; values
 * are checked with the null and numeric relaxations of `isTypeCompatible`.
 * Nothing is thrown: every problem lands in the returned list.
 */
export function validateQueryAgainstSchema(
  query: unknown,
  schema: unknown,
  options: QueryValidationOptions = {},
): string[] {
  if (!isPlainDocument(query)) {
    return ["Query document must be a document."];
  }
  if (!isObjectSchemaMap(schema)) {
    return ["Expected schema must be a map of field names to schema nodes."];
  }

  const ctx: SchemaContext = {
    errors: [],
    maxDepth: options.maxDepth ?? DEFAULT_MAX_QUERY_DEPTH,
  };
  validateFilter(query, schema, "", 0, ctx);
  return ctx.errors;
}

function validateFilter(
  part: unknown,
  schema: FieldMap,
  pathPrefix: string,
  depth: number,
  ctx: SchemaContext,
): void {
  const { errors } = ctx;

  if (depth > ctx.maxDepth) {
    errors.push(depthExceededMessage(pathPrefix, ctx.maxDepth));
    return;
  }
  if (!isPlainDocument(part)) {
    errors.push(
      `Invalid query structure at '${pathPrefix}': Expected a document, got ${classifyValue(part)}.`,
    );
    return;
  }

  for (const [key, value] of Object.entries(part)) {
    const currentPath = joinPath(pathPrefix, key);

    if (LOGICAL_ARRAY_OPERATORS.has(key)) {
      validateLogical(key, value, schema, currentPath, depth, ctx);
    } else if (key === "$not") {
      validateFilterLevelNot(value, currentPath, ctx);
    } else if (isOperatorKey(key)) {
      // $expr, $where, $text, $comment, ... carry no field context to check against
      if (!isKnownOperator(key)) {
        errors.push(`Unknown operator '${key}' used at '${currentPath}'.`);
      }
    } else {
      const node = resolveFieldPath(key, schema, pathPrefix, currentPath, ctx);
      if (node !== undefined) {
        validateFieldValue(value, node, currentPath, depth + 1, ctx);
      }
    }
  }
}

function validateLogical(
  op: string,
  value: unknown,
  schema: FieldMap,
  path: string,
  depth: number,
  ctx: SchemaContext,
): void {
  const { errors } = ctx;

  if (!Array.isArray(value)) {
    errors.push(invalidValue(op, path, "Expected an array of query documents."));
    return;
  }
  if (value.length === 0) {
    errors.push(`Warning: Operator '${op}' at '${path}' has an empty array.`);
    return;
  }
  value.forEach((subQuery: unknown, i) => {
    const subPath = `${path}[${i}]`;
    if (!isPlainDocument(subQuery)) {
      errors.push(
        `Invalid element in '${op}' array at '${subPath}': Expected a query document.`,
      );
      return;
    }
    // Each branch is a complete filter over the same scope
    validateFilter(subQuery, schema, subPath, depth + 1, ctx);
  });
}

/**
 * A `$not` at filter level has no field to type-check against, so only its shape is checked
 */
function validateFilterLevelNot(value: unknown, path: string, ctx: SchemaContext): void {
  if (isRegexLike(value)) {
    return;
  }
  if (!isPlainDocument(value)) {
    ctx.errors.push(
      invalidValue("$not", path, "Expected an operator expression (document) or a regex pattern."),
    );
    return;
  }
  if (!Object.keys(value).every((k) => isOperatorKey(k))) {
    ctx.errors.push(
      `Warning: Value for '$not' at '${path}' contains non-operator keys. Validation might be incomplete.`,
    );
  }
}

/**
 * Walk a dotted key through nested object schemas, reporting the first segment that fails
 */
function resolveFieldPath(
  key: string,
  schema: FieldMap,
  pathPrefix: string,
  currentPath: string,
  ctx: SchemaContext,
): SchemaNode | undefined {
  const { errors } = ctx;
  const parts = key.split(".");
  let level: FieldMap = schema;
  let levelPath = pathPrefix;

  for (const [i, part] of parts.entries()) {
    if (!level.has(part)) {
      errors.push(
        `Invalid query key '${currentPath}': Field '${part}' not found in schema at '${levelPath}'.`,
      );
      return undefined;
    }

    const node = level.get(part);
    if (!isSchemaNode(node)) {
      errors.push(
        `Schema definition error: Field '${part}' at '${joinPath(levelPath, part)}' has an invalid schema node.`,
      );
      return undefined;
    }

    if (i === parts.length - 1) {
      return node;
    }

    levelPath = joinPath(levelPath, part);
    if (!node.types.has("object")) {
      errors.push(
        `Invalid query path '${currentPath}': Field '${part}' at '${levelPath}' is not defined as an 'object' in the schema, cannot traverse further.`,
      );
      return undefined;
    }
    if (!isObjectSchemaMap(node.objectSchema)) {
      errors.push(
        `Schema definition error: Field '${part}' at '${levelPath}' is an 'object' but lacks an object schema definition.`,
      );
      return undefined;
    }
    level = node.objectSchema;
  }

  return undefined;
}

/**
 * Dispatch a field's query value: operator block or implicit equality
 */
function validateFieldValue(
  value: unknown,
  node: SchemaNode,
  path: string,
  depth: number,
  ctx: SchemaContext,
): void {
  if (isPlainDocument(value) && Object.keys(value).some((k) => isOperatorKey(k))) {
    validateOperatorBlock(value, node, path, depth, ctx);
    return;
  }

  const allowed = node.types;
  if (allowed.size === 0) {
    ctx.errors.push(`Schema definition error at '${path}': Field lacks 'types' definition.`);
    return;
  }
  const valueType = classifyValue(value);
  if (!isTypeCompatible(valueType, allowed)) {
    ctx.errors.push(
      `Type mismatch for field '${path}': Query uses type '${valueType}', but schema expects ${formatTypes(allowed)}.`,
    );
  }
}

/**
 * Element types carrying real information (an empty-array placeholder carries none)
 */
function informativeElementTypes(element: SchemaNode): ReadonlySet<TypeTag> | undefined {
  if (element.types.size === 1 && element.types.has("empty_array")) {
    return undefined;
  }
  return element.types;
}

function validateOperatorBlock(
  block: PlainDocument,
  node: SchemaNode,
  path: string,
  depth: number,
  ctx: SchemaContext,
): void {
  const { errors } = ctx;

  if (depth > ctx.maxDepth) {
    errors.push(depthExceededMessage(path, ctx.maxDepth));
    return;
  }

  const mix = partitionKeys(Object.keys(block));
  if (mix.operators.length > 0 && mix.fields.length > 0) {
    errors.push(mixedKeysMessage(path, mix));
  }

  const allowed = node.types;
  const element = isSchemaNode(node.elementSchema) ? node.elementSchema : undefined;

  for (const op of mix.operators) {
    const opValue = block[op];
    const opPath = `${path}.${op}`;

    if (!isKnownOperator(op)) {
      errors.push(`Unknown operator '${op}' used at '${opPath}'.`);
      continue;
    }

    if (COMPARISON_OPERATORS.has(op)) {
      if (allowed.size === 0) {
        errors.push(`Schema definition error at '${path}': Field lacks 'types' definition.`);
        continue;
      }
      const valueType = classifyValue(opValue);
      if (!isTypeCompatible(valueType, allowed)) {
        errors.push(
          `Type mismatch for operator '${op}' at '${opPath}': Query uses type '${valueType}', but schema expects ${formatTypes(allowed)}.`,
        );
      }
      continue;
    }

    switch (op) {
      case "$in":
      case "$nin":
        if (!Array.isArray(opValue)) {
          errors.push(invalidValue(op, opPath, "Expected an array."));
        } else if (allowed.size === 0) {
          errors.push(`Schema definition error at '${path}': Field lacks 'types' definition.`);
        } else {
          checkItems(op, opValue, allowed, opPath, "schema expects", ctx);
        }
        break;

      case "$exists":
        if (typeof opValue !== "boolean") {
          errors.push(invalidValue(op, opPath, "Expected boolean (true/false)."));
        }
        break;

      case "$type":
        checkTypeOperator(opValue, allowed, opPath, ctx);
        break;

      case "$regex":
        if (!allowed.has("string")) {
          errors.push(
            `Usage warning for operator '${op}' at '${opPath}': Field type is not 'string' in schema (${formatTypes(allowed)}), $regex might not work as expected.`,
          );
        }
        if (typeof opValue !== "string" && !isRegexLike(opValue)) {
          errors.push(invalidValue(op, opPath, "Expected a string or regex pattern."));
        }
        break;

      case "$options":
        if (typeof opValue !== "string") {
          errors.push(invalidValue(op, opPath, "Expected a string of regex options."));
        }
        break;

      case "$size":
        if (!allowed.has("array")) {
          errors.push(
            `Usage error for operator '${op}' at '${opPath}': Field type is not 'array' in schema (${formatTypes(allowed)}).`,
          );
        }
        if (!isIntegerValue(opValue)) {
          errors.push(invalidValue(op, opPath, "Expected an integer size."));
        }
        break;

      case "$mod":
        if (
          !Array.isArray(opValue) ||
          opValue.length !== 2 ||
          !opValue.every((item: unknown) => isNumericValue(item))
        ) {
          errors.push(
            invalidValue(op, opPath, "Expected an array of two numbers [divisor, remainder]."),
          );
        } else if (!isTypeCompatible("int", allowed)) {
          errors.push(
            `Usage warning for operator '${op}' at '${opPath}': Field type is not numeric in schema (${formatTypes(allowed)}).`,
          );
        }
        break;

      case "$all":
        if (!allowed.has("array")) {
          errors.push(
            `Usage error for operator '${op}' at '${opPath}': Field type is not 'array' in schema (${formatTypes(allowed)}).`,
          );
        } else if (!Array.isArray(opValue)) {
          errors.push(invalidValue(op, opPath, "Expected an array of elements."));
        } else if (element === undefined) {
          errors.push(
            `Schema definition error at '${path}': Array field lacks an element schema needed to validate '${op}'.`,
          );
        } else if (element.types.size === 0) {
          errors.push(`Schema definition error at '${path}': Array element schema lacks 'types'.`);
        } else {
          const elementTypes = informativeElementTypes(element);
          if (elementTypes !== undefined) {
            checkItems(op, opValue, elementTypes, opPath, "array element schema expects", ctx);
          }
        }
        break;

      case "$elemMatch":
        validateElemMatch(opValue, allowed, element, path, opPath, depth, ctx);
        break;

      case "$not":
        validateFieldLevelNot(opValue, node, opPath, depth, ctx);
        break;

      default:
        // geospatial, text, bitwise, comment: no type rule
        break;
    }
  }
}

function checkItems(
  op: string,
  items: readonly unknown[],
  allowed: ReadonlySet<TypeTag>,
  opPath: string,
  expectation: string,
  ctx: SchemaContext,
): void {
  items.forEach((item, i) => {
    const itemType = classifyValue(item);
    if (!isTypeCompatible(itemType, allowed)) {
      ctx.errors.push(
        `Type mismatch for item in '${op}' array at '${opPath}[${i}]': Item type is '${itemType}', but ${expectation} ${formatTypes(allowed)}.`,
      );
    }
  });
}

function checkTypeOperator(
  opValue: unknown,
  allowed: ReadonlySet<TypeTag>,
  opPath: string,
  ctx: SchemaContext,
): void {
  const specs: unknown[] = Array.isArray(opValue) ? opValue : [opValue];

  for (const spec of specs) {
    let key: string | number;
    if (typeof spec === "string") {
      key = spec;
    } else if (isIntegerValue(spec)) {
      key = Number(String(spec));
    } else {
      ctx.errors.push(
        invalidValue(
          "$type",
          opPath,
          "Expected BSON type string (e.g., 'string') or number (e.g., 2).",
        ),
      );
      continue;
    }

    const requested = resolveTypeSpec(key);
    if (requested === undefined) {
      ctx.errors.push(invalidValue("$type", opPath, `Unknown BSON type '${key}'.`));
      continue;
    }
    // $type inspects the stored type, which can differ from what the sample showed
    if (allowed.size > 0 && !requested.some((tag) => allowed.has(tag))) {
      ctx.errors.push(
        `Warning: Operator '$type' at '${opPath}' checks for type '${key}', which might not be among the expected schema types ${formatTypes(allowed)}.`,
      );
    }
  }
}

function validateElemMatch(
  opValue: unknown,
  allowed: ReadonlySet<TypeTag>,
  element: SchemaNode | undefined,
  path: string,
  opPath: string,
  depth: number,
  ctx: SchemaContext,
): void {
  const { errors } = ctx;

  if (!allowed.has("array")) {
    errors.push(
      `Usage error for operator '$elemMatch' at '${opPath}': Field type is not 'array' in schema (${formatTypes(allowed)}).`,
    );
    return;
  }
  if (!isPlainDocument(opValue)) {
    errors.push(
      invalidValue("$elemMatch", opPath, "Expected a query document for element matching."),
    );
    return;
  }
  if (element === undefined) {
    errors.push(
      `Schema definition error at '${path}': Array field lacks an element schema needed to validate '$elemMatch'.`,
    );
    return;
  }
  if (element.types.size === 0) {
    errors.push(`Schema definition error at '${path}': Array element schema lacks 'types'.`);
    return;
  }
  if (informativeElementTypes(element) === undefined) {
    return;
  }

  if (element.types.has("object")) {
    if (!isObjectSchemaMap(element.objectSchema)) {
      errors.push(
        `Schema definition error at '${path}': Array element is 'object' but lacks an object schema.`,
      );
      return;
    }
    // The body is a full filter over each element document
    validateFilter(opValue, element.objectSchema, opPath, depth + 1, ctx);
    return;
  }

  // Primitive elements: the body is an operator block against the element schema
  validateFieldValue(opValue, element, opPath, depth + 1, ctx);
}

/**
 * `$not` inside a field's operator block is checked against that same field
 */
function validateFieldLevelNot(
  opValue: unknown,
  node: SchemaNode,
  opPath: string,
  depth: number,
  ctx: SchemaContext,
): void {
  if (isRegexLike(opValue)) {
    if (!node.types.has("string")) {
      ctx.errors.push(
        `Usage warning for operator '$not' at '${opPath}': Field type is not 'string' in schema (${formatTypes(node.types)}), a regex might not work as expected.`,
      );
    }
    return;
  }
  if (!isPlainDocument(opValue)) {
    ctx.errors.push(
      invalidValue("$not", opPath, "Expected an operator expression (document) or a regex pattern."),
    );
    return;
  }
  const keys = Object.keys(opValue);
  if (keys.length === 0 || !keys.every((k) => isOperatorKey(k))) {
    ctx.errors.push(invalidValue("$not", opPath, "Expected an operator expression, not a field document."));
    return;
  }
  validateOperatorBlock(opValue, node, opPath, depth + 1, ctx);
}
