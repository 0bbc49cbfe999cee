/**
 * Snapshot file utilities
 * Persist schema snapshots produced by `infer` so `validate` can reuse them
 */

import fs from "fs/promises";
import type { DatabaseSchema } from "../../types/data-model.js";
import { FileIOError, SchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  deserializeDatabaseSchema,
  serializeDatabaseSchema,
} from "./codec.js";

/**
 * Load a database schema snapshot from a JSON file
 */
export async function loadSchemaSnapshot(path: string): Promise<DatabaseSchema> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    throw new FileIOError(`Schema snapshot not found at: ${path}`, undefined, {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new SchemaError(`Schema snapshot at ${path} is not valid JSON`, undefined, {
      cause: error,
    });
  }

  const schema = deserializeDatabaseSchema(json);
  logger.info("Loaded schema snapshot", {
    path,
    collections: Object.keys(schema).length,
  });
  return schema;
}

/**
 * Save a database schema snapshot as pretty-printed JSON
 */
export async function saveSchemaSnapshot(
  schema: DatabaseSchema,
  path: string,
): Promise<void> {
  try {
    await fs.writeFile(
      path,
      JSON.stringify(serializeDatabaseSchema(schema), null, 2),
      "utf-8",
    );
    logger.info("Saved schema snapshot", { path });
  } catch (error) {
    throw new FileIOError(`Failed to save schema snapshot to ${path}`, undefined, {
      cause: error,
    });
  }
}
