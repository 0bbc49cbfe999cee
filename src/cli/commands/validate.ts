/**
 * Validate command - check a query filter against an inferred collection schema
 */

import { Command } from "commander";
import { SchemaToolkit } from "../../lib/toolkit/index.js";
import { loadSchemaSnapshot } from "../../lib/snapshot/index.js";
import { QueryValidator } from "../../lib/validator/index.js";
import type { CollectionSchema, ValidationOutcome } from "../../types/data-model.js";
import { ConfigError, SchemaError } from "../../utils/errors.js";
import { requireConnection } from "../../utils/config-loader.js";
import type { ResolvedConfig, ValidateCommandOptions } from "../config/types.js";
import {
  addCommonOptions,
  addConnectionOptions,
  addQueryInputOptions,
  applyLogLevel,
  emitResult,
  loadCommandConfig,
  parsePositiveInt,
  parseStrategy,
  readQueryInput,
  runCommand,
  type CommandContext,
  type CommandResult,
} from "../shared.js";
import { outcomeResult, parseOutputFormat } from "./validate-syntax.js";

async function schemaFromSnapshot(path: string, collection: string): Promise<CollectionSchema> {
  const snapshot = await loadSchemaSnapshot(path);
  const schema = snapshot[collection];
  if (schema === undefined) {
    throw new SchemaError(`Collection '${collection}' not found in schema snapshot ${path}.`, {
      available: Object.keys(snapshot),
    });
  }
  return schema;
}

async function validateLive(
  query: unknown,
  collection: string,
  config: ResolvedConfig,
  context: CommandContext,
): Promise<ValidationOutcome> {
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
    return await toolkit.validateQuery(query, collection);
  } finally {
    await toolkit.close();
  }
}

/**
 * The syntax pass runs first; a malformed filter is reported without touching the schema
 */
export async function executeValidate(
  options: ValidateCommandOptions,
  context: CommandContext = {},
): Promise<CommandResult> {
  return runCommand("schema-validation", async () => {
    applyLogLevel(options.logLevel);
    const config = loadCommandConfig(
      options.config,
      {
        source: { uri: options.uri, database: options.db, collection: options.collection },
        sampling: { sampleSize: options.sampleSize, strategy: options.strategy },
        maxDepth: options.maxDepth,
      },
      context.env,
    );
    const collection = config.source.collection;
    if (!collection) {
      throw new ConfigError(
        "Missing collection: pass --collection or set source.collection in the config file",
      );
    }

    const query = await readQueryInput(options, context.stdin);
    const format = options.format ?? "json";
    const validationOptions = { maxDepth: config.validation.maxDepth };

    const syntax = new QueryValidator(undefined, validationOptions).validateSyntax(query);
    if (!syntax.valid) {
      return outcomeResult(syntax, "syntax", format, { collection });
    }

    const outcome =
      options.schema !== undefined
        ? new QueryValidator(
            await schemaFromSnapshot(options.schema, collection),
            validationOptions,
          ).validate(query)
        : await validateLive(query, collection, config, context);

    return outcomeResult(outcome, "schema", format, { collection });
  });
}

export function createValidateCommand(): Command {
  const command = new Command("validate");

  command.description(
    "Validate a query filter against a collection schema (from a snapshot file or sampled live)",
  );
  addConnectionOptions(command)
    .option("--collection <name>", "Collection whose schema the query targets")
    .option("--schema <path>", "Schema snapshot written by `infer --output`")
    .option("--sample-size <count>", "Documents to sample when no snapshot is given", parsePositiveInt)
    .option("--strategy <strategy>", "Sampling strategy: random, firstN", parseStrategy);
  addQueryInputOptions(command)
    .option("--max-depth <n>", "Maximum query nesting depth inspected", parsePositiveInt)
    .option("--format <format>", "Output format: json, text", parseOutputFormat, "json");
  addCommonOptions(command).action(async (options: ValidateCommandOptions) => {
    emitResult(await executeValidate(options));
  });

  return command;
}
