/**
 * Find-query execution against a collection
 */

import type { FindOptions } from "mongodb";
import { isPlainDocument } from "../classifier/index.js";
import { ExecutionError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { FindableCollection, FindRequest, FindResult, SortSpec } from "./types.js";

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function toSortDocument(sort: readonly SortSpec[]): Record<string, 1 | -1> {
  const spec: Record<string, 1 | -1> = {};
  for (const { field, direction } of sort) {
    if (direction !== 1 && direction !== -1) {
      throw new ExecutionError(
        `Invalid sort direction for field '${field}': expected 1 or -1.`,
        { field, direction },
      );
    }
    spec[field] = direction;
  }
  return spec;
}

/**
 * Run a find query and collect its results
 *
 * A `limit` of 0 means no limit, as in the driver.
 */
export async function executeFindQuery(
  collection: FindableCollection,
  request: FindRequest,
): Promise<FindResult> {
  const { filter, projection, sort, limit, skip } = request;

  if (!isPlainDocument(filter)) {
    throw new ExecutionError("Query filter must be a document.");
  }
  if (limit !== undefined && !isCount(limit)) {
    throw new ExecutionError("Limit must be a non-negative integer.", { limit });
  }
  if (skip !== undefined && !isCount(skip)) {
    throw new ExecutionError("Skip must be a non-negative integer.", { skip });
  }

  const options: FindOptions = {};
  if (projection !== undefined) {
    options.projection = projection;
  }
  if (sort !== undefined && sort.length > 0) {
    options.sort = toSortDocument(sort);
  }
  if (limit !== undefined) {
    options.limit = limit;
  }
  if (skip !== undefined) {
    options.skip = skip;
  }

  logger.debug("Executing find query", {
    collection: collection.collectionName,
    limit,
    skip,
  });

  try {
    const documents = await collection.find(filter, options).toArray();
    return { documents, count: documents.length };
  } catch (error) {
    throw new ExecutionError(
      `Query execution failed on '${collection.collectionName}': ` +
        (error instanceof Error ? error.message : String(error)),
      { collection: collection.collectionName },
      { cause: error },
    );
  }
}
