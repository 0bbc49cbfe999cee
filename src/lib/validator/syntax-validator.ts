/**
 * Schema-free structural validation of query filter documents
 */

import {
  classifyValue,
  isIntegerValue,
  isNumericValue,
  isPlainDocument,
  isRegexLike,
} from "../classifier/index.js";
import {
  DEFAULT_MAX_QUERY_DEPTH,
  depthExceededMessage,
  joinPath,
  mixedKeysMessage,
  partitionKeys,
} from "./helpers.js";
import {
  isKnownOperator,
  isOperatorKey,
  LOGICAL_ARRAY_OPERATORS,
  OPERATOR_SIGIL,
} from "./operators.js";
import type { QueryValidationOptions } from "./types.js";

interface SyntaxContext {
  errors: string[];
  maxDepth: number;
}

function invalidValue(op: string, path: string, expected: string): string {
  return `Invalid value type for operator '${op}' at '${path}': ${expected}`;
}

function isTypeSpec(value: unknown): boolean {
  return typeof value === "string" || isIntegerValue(value);
}

/**
 * Check the structure of a filter document without a schema: known operators,
 * the value shapes operators require, and that field values do not mix
 * operators with field names. Problems are collected, never thrown.
 *
 * @returns every problem found, in document order; empty when the filter is well-formed
 */
export function validateQuerySyntax(
  query: unknown,
  options: QueryValidationOptions = {},
): string[] {
  if (!isPlainDocument(query)) {
    return ["Query root must be a document."];
  }

  const ctx: SyntaxContext = {
    errors: [],
    maxDepth: options.maxDepth ?? DEFAULT_MAX_QUERY_DEPTH,
  };
  walk(query, "", 0, ctx);
  return ctx.errors;
}

function walk(part: unknown, pathPrefix: string, depth: number, ctx: SyntaxContext): void {
  if (depth > ctx.maxDepth) {
    ctx.errors.push(depthExceededMessage(pathPrefix, ctx.maxDepth));
    return;
  }
  if (!isPlainDocument(part)) {
    ctx.errors.push(
      `Invalid structure at '${pathPrefix}': Expected a document, but found ${classifyValue(part)}.`,
    );
    return;
  }

  for (const [key, value] of Object.entries(part)) {
    const currentPath = joinPath(pathPrefix, key);
    if (isOperatorKey(key)) {
      checkOperator(key, value, currentPath, depth, ctx);
    } else {
      checkField(key, value, pathPrefix, currentPath, depth, ctx);
    }
  }
}

function checkOperator(
  op: string,
  value: unknown,
  path: string,
  depth: number,
  ctx: SyntaxContext,
): void {
  const { errors } = ctx;

  if (!isKnownOperator(op)) {
    errors.push(`Unknown operator '${op}' used at '${path}'.`);
    return;
  }

  if (LOGICAL_ARRAY_OPERATORS.has(op)) {
    if (!Array.isArray(value)) {
      errors.push(invalidValue(op, path, "Expected an array of query documents."));
    } else if (value.length === 0) {
      errors.push(`Warning: Operator '${op}' at '${path}' has an empty array.`);
    } else {
      value.forEach((subDocument: unknown, i) => {
        walk(subDocument, `${path}[${i}]`, depth + 1, ctx);
      });
    }
    return;
  }

  switch (op) {
    case "$not":
      if (isPlainDocument(value)) {
        walk(value, path, depth + 1, ctx);
      } else if (!isRegexLike(value)) {
        errors.push(
          invalidValue(
            op,
            path,
            "Expected an operator expression block (document) or a regex pattern.",
          ),
        );
      }
      break;

    case "$in":
    case "$nin":
    case "$all":
      if (!Array.isArray(value)) {
        errors.push(invalidValue(op, path, "Expected an array."));
      }
      break;

    case "$elemMatch":
      if (isPlainDocument(value)) {
        walk(value, path, depth + 1, ctx);
      } else {
        errors.push(invalidValue(op, path, "Expected a query document."));
      }
      break;

    case "$exists":
      if (typeof value !== "boolean") {
        errors.push(invalidValue(op, path, "Expected a boolean (true/false)."));
      }
      break;

    case "$type": {
      const valid = Array.isArray(value)
        ? value.every((item: unknown) => isTypeSpec(item))
        : isTypeSpec(value);
      if (!valid) {
        errors.push(
          invalidValue(
            op,
            path,
            "Expected a BSON type string, number, or an array of strings/numbers.",
          ),
        );
      }
      break;
    }

    case "$size":
      if (!isIntegerValue(value)) {
        errors.push(invalidValue(op, path, "Expected an integer."));
      }
      break;

    case "$regex":
      if (typeof value !== "string" && !isRegexLike(value)) {
        errors.push(invalidValue(op, path, "Expected a string or regex pattern."));
      }
      break;

    case "$mod":
      if (
        !Array.isArray(value) ||
        value.length !== 2 ||
        !value.every((item: unknown) => isNumericValue(item))
      ) {
        errors.push(
          invalidValue(op, path, "Expected an array of two numbers [divisor, remainder]."),
        );
      }
      break;

    default:
      // comparison, geospatial, text, bitwise and comment operators take any shape here
      break;
  }
}

function checkField(
  key: string,
  value: unknown,
  pathPrefix: string,
  currentPath: string,
  depth: number,
  ctx: SyntaxContext,
): void {
  const { errors } = ctx;

  if (key === "") {
    errors.push(`Empty field name found at '${pathPrefix}'.`);
    return;
  }
  if (key.split(".").some((segment) => segment.startsWith(OPERATOR_SIGIL))) {
    errors.push(
      `Invalid field name '${key}' with a path segment starting with '${OPERATOR_SIGIL}' at '${currentPath}'.`,
    );
    return;
  }

  // Scalars, arrays and regexes are implicit equality matches
  if (!isPlainDocument(value)) {
    return;
  }

  const mix = partitionKeys(Object.keys(value));
  if (mix.operators.length > 0 && mix.fields.length > 0) {
    errors.push(mixedKeysMessage(currentPath, mix));
  } else if (mix.operators.length > 0 || mix.fields.length > 0) {
    walk(value, currentPath, depth + 1, ctx);
  }
}
