/**
 * Infer command - sample collections and infer their schemas
 */

import { Command } from "commander";
import { extractFieldPaths, getArrayFieldPaths } from "../../lib/inferencer/index.js";
import { SchemaToolkit } from "../../lib/toolkit/index.js";
import { saveSchemaSnapshot, serializeDatabaseSchema } from "../../lib/snapshot/index.js";
import { requireConnection } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import type { InferCommandOptions } from "../config/types.js";
import {
  addCommonOptions,
  addConnectionOptions,
  applyLogLevel,
  emitResult,
  loadCommandConfig,
  parsePositiveInt,
  parseStrategy,
  runCommand,
  successResult,
  type CommandContext,
  type CommandResult,
} from "../shared.js";

/**
 * Execute infer command
 */
export async function executeInfer(
  options: InferCommandOptions,
  context: CommandContext = {},
): Promise<CommandResult> {
  return runCommand("inference", async () => {
    applyLogLevel(options.logLevel);
    const startTime = Date.now();

    const config = loadCommandConfig(
      options.config,
      {
        source: { uri: options.uri, database: options.db, collection: options.collection },
        sampling: { sampleSize: options.sampleSize, strategy: options.strategy },
        maxDepth: options.maxDepth,
      },
      context.env,
    );
    const { uri, database } = requireConnection(config);

    const toolkit = new SchemaToolkit(
      {
        uri,
        database,
        sampleSize: config.sampling.sampleSize,
        strategy: config.sampling.strategy,
        maxDepth: config.validation.maxDepth,
      },
      context.dataSource,
    );

    try {
      const schema = await toolkit.getDatabaseSchema({ collection: config.source.collection });

      if (options.output !== undefined) {
        await saveSchemaSnapshot(schema, options.output);
      }

      const collections = Object.keys(schema);
      logger.info("Schema inference complete", { collections: collections.length });

      return successResult({
        status: "success",
        phase: "inference",
        database,
        ...(options.output !== undefined ? { artifacts: { schema: options.output } } : {}),
        schema: serializeDatabaseSchema(schema),
        summary: {
          collections,
          fieldPaths: Object.fromEntries(
            Object.entries(schema).map(([name, fields]): [string, number] => [
              name,
              extractFieldPaths(fields).size,
            ]),
          ),
          arrayFields: Object.fromEntries(
            Object.entries(schema).map(([name, fields]): [string, string[]] => [
              name,
              getArrayFieldPaths(fields),
            ]),
          ),
          sampleSize: config.sampling.sampleSize,
          strategy: config.sampling.strategy,
          durationMs: Date.now() - startTime,
        },
      });
    } finally {
      await toolkit.close();
    }
  });
}

/**
 * Create infer command
 */
export function createInferCommand(): Command {
  const command = new Command("infer");

  command.description(
    "Sample one collection (or every collection) and print the inferred schema",
  );
  addConnectionOptions(command)
    .option("--collection <name>", "Collection to analyze (default: all collections)")
    .option("--sample-size <count>", "Number of documents to sample per collection", parsePositiveInt)
    .option("--strategy <strategy>", "Sampling strategy: random, firstN", parseStrategy)
    .option("--max-depth <n>", "Maximum document nesting depth inferred", parsePositiveInt)
    .option("--output <path>", "Also write the schema snapshot to this JSON file");
  addCommonOptions(command).action(async (options: InferCommandOptions) => {
    emitResult(await executeInfer(options));
  });

  return command;
}
