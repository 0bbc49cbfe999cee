/**
 * Query command - run a find query and print the matching documents
 */

import { Command } from "commander";
import { BSON } from "mongodb";
import { SchemaToolkit } from "../../lib/toolkit/index.js";
import { ConfigError } from "../../utils/errors.js";
import { requireConnection } from "../../utils/config-loader.js";
import type { QueryCommandOptions } from "../config/types.js";
import {
  addCommonOptions,
  addConnectionOptions,
  addQueryInputOptions,
  applyLogLevel,
  emitResult,
  loadCommandConfig,
  parseDocumentArgument,
  parseNonNegativeInt,
  parseSortOption,
  readQueryInput,
  runCommand,
  type CommandContext,
  type CommandResult,
} from "../shared.js";

export async function executeQuery(
  options: QueryCommandOptions,
  context: CommandContext = {},
): Promise<CommandResult> {
  return runCommand("execution", async () => {
    applyLogLevel(options.logLevel);
    const config = loadCommandConfig(
      options.config,
      { source: { uri: options.uri, database: options.db, collection: options.collection } },
      context.env,
    );
    const { uri, database } = requireConnection(config);
    const collection = config.source.collection;
    if (!collection) {
      throw new ConfigError(
        "Missing collection: pass --collection or set source.collection in the config file",
      );
    }

    const ejson = options.ejson ?? false;
    const filter = await readQueryInput(options, context.stdin);
    const projection =
      options.projection !== undefined
        ? parseDocumentArgument(options.projection, ejson, "Projection")
        : undefined;

    const toolkit = new SchemaToolkit({ uri, database }, context.dataSource);
    try {
      const result = await toolkit.executeQuery(collection, {
        filter,
        projection,
        sort: options.sort,
        limit: options.limit,
        skip: options.skip,
      });
      return {
        exitCode: 0,
        stdout: BSON.EJSON.stringify(
          {
            status: "success",
            phase: "execution",
            collection,
            count: result.count,
            documents: result.documents,
          },
          undefined,
          2,
          { relaxed: true },
        ),
      };
    } finally {
      await toolkit.close();
    }
  });
}

export function createQueryCommand(): Command {
  const command = new Command("query");

  command.description("Execute a find query and print the matching documents as Extended JSON");
  addConnectionOptions(command)
    .option("--collection <name>", "Collection to query")
    .option("--projection <json>", "Projection document as JSON")
    .option("--sort <spec>", "Sort order, e.g. 'age:-1,name:1'", parseSortOption)
    .option("--limit <n>", "Maximum documents returned (0 = no limit)", parseNonNegativeInt)
    .option("--skip <n>", "Documents skipped before returning results", parseNonNegativeInt);
  addQueryInputOptions(command);
  addCommonOptions(command).action(async (options: QueryCommandOptions) => {
    emitResult(await executeQuery(options));
  });

  return command;
}
