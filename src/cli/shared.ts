/**
 * Helpers shared by the CLI commands: option parsing, query input, result envelopes
 */

import { readFile } from "fs/promises";
import { InvalidArgumentError, type Command } from "commander";
import { BSON } from "mongodb";
import type { SortSpec } from "../lib/executor/index.js";
import { isSamplingStrategyName, type SamplingStrategyName } from "../lib/sampler/index.js";
import { isPlainDocument, type PlainDocument } from "../lib/classifier/index.js";
import type { DataSource } from "../lib/toolkit/index.js";
import {
  ErrorCode,
  exitCodeFor,
  FileIOError,
  MongoProbeError,
  toMongoProbeError,
} from "../utils/errors.js";
import { isLogLevel, logger, type LogLevel } from "../utils/logger.js";
import { resolveConfig, type CliOverrides } from "../utils/config-loader.js";
import { parseConfigFile } from "./config/parser.js";
import type { QueryInputOptions, ResolvedConfig } from "./config/types.js";

export type StdinSource = AsyncIterable<string | Buffer>;

/**
 * Injection points for running commands without a terminal or a live server
 */
export interface CommandContext {
  stdin?: StdinSource;
  env?: Readonly<Record<string, string | undefined>>;
  dataSource?: DataSource;
}

export interface CommandResult {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

export function parseStrategy(value: string): SamplingStrategyName {
  if (!isSamplingStrategyName(value)) {
    throw new InvalidArgumentError("Must be one of: random, firstN.");
  }
  return value;
}

/**
 * `field:1,other:-1` → sort specs
 */
export function parseSortOption(value: string): SortSpec[] {
  return value.split(",").map((entry): SortSpec => {
    const [field, direction = "1"] = entry.split(":").map((p) => p.trim());
    if (!field) {
      throw new InvalidArgumentError(`Empty sort field in '${value}'.`);
    }
    if (direction === "1" || direction === "asc") {
      return { field, direction: 1 };
    }
    if (direction === "-1" || direction === "desc") {
      return { field, direction: -1 };
    }
    throw new InvalidArgumentError(
      `Invalid sort direction '${direction}' for '${field}': use 1, -1, asc or desc.`,
    );
  });
}

/**
 * Load the config file (if any) and resolve it against CLI overrides and the environment
 */
export function loadCommandConfig(
  configPath: string | undefined,
  cli: CliOverrides,
  env?: Readonly<Record<string, string | undefined>>,
): ResolvedConfig {
  const file = configPath ? parseConfigFile(configPath) : {};
  return resolveConfig(cli, file, env);
}

async function readAll(stream: StdinSource): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Parse JSON text, or MongoDB Extended JSON when `ejson` is set
 */
export function parseJsonText(text: string, ejson: boolean, what: string): unknown {
  try {
    const parsed: unknown = ejson ? BSON.EJSON.parse(text, { relaxed: false }) : JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new MongoProbeError(
      ErrorCode.INPUT_READ_ERROR,
      `${what} is not valid ${ejson ? "Extended JSON" : "JSON"}: ` +
        (error instanceof Error ? error.message : String(error)),
      undefined,
      { cause: error },
    );
  }
}

/**
 * Parse a JSON argument that must be a document (projection and similar)
 */
export function parseDocumentArgument(text: string, ejson: boolean, what: string): PlainDocument {
  const parsed = parseJsonText(text, ejson, what);
  if (!isPlainDocument(parsed)) {
    throw new MongoProbeError(ErrorCode.INPUT_READ_ERROR, `${what} must be a JSON object.`);
  }
  return parsed;
}

/**
 * Read the query from --query, --query-file or stdin, in that order
 */
export async function readQueryInput(
  options: QueryInputOptions,
  stdin: StdinSource = process.stdin,
): Promise<unknown> {
  if (options.query !== undefined && options.queryFile !== undefined) {
    throw new MongoProbeError(
      ErrorCode.INPUT_READ_ERROR,
      "Use either --query or --query-file, not both.",
    );
  }

  let text: string;
  if (options.query !== undefined) {
    text = options.query;
  } else if (options.queryFile !== undefined) {
    try {
      text = await readFile(options.queryFile, "utf-8");
    } catch (error) {
      throw new FileIOError(`Query file not found at: ${options.queryFile}`, undefined, {
        cause: error,
      });
    }
  } else {
    logger.debug("Reading query from stdin");
    text = await readAll(stdin);
  }

  if (text.trim() === "") {
    throw new MongoProbeError(
      ErrorCode.INPUT_READ_ERROR,
      "No query provided: pass --query, --query-file, or pipe it on stdin.",
    );
  }
  return parseJsonText(text, options.ejson ?? false, "Query");
}

export function successResult(payload: unknown, exitCode = 0): CommandResult {
  return { exitCode, stdout: JSON.stringify(payload, null, 2) };
}

/**
 * Run a command body, turning any thrown error into the error envelope and its exit code
 */
export async function runCommand(
  phase: string,
  body: () => Promise<CommandResult>,
): Promise<CommandResult> {
  try {
    return await body();
  } catch (error) {
    const probeError = toMongoProbeError(error);
    logger.debug("Command failed", { phase, code: probeError.code });
    return {
      exitCode: exitCodeFor(probeError),
      stderr: JSON.stringify(probeError.toResponse(phase), null, 2),
    };
  }
}

export function emitResult(result: CommandResult): void {
  if (result.stdout !== undefined) {
    console.log(result.stdout);
  }
  if (result.stderr !== undefined) {
    console.error(result.stderr);
  }
  process.exitCode = result.exitCode;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Must be one of: error, warn, info, debug.");
  }
  return value;
}

/**
 * Options every command accepts
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", parseLogLevel);
}

export function addConnectionOptions(command: Command): Command {
  return command
    .option("--uri <uri>", "MongoDB connection URI (default: $MONGODB_URI)")
    .option("--db <database>", "Database name (default: $MONGODB_DATABASE)");
}

export function addQueryInputOptions(command: Command): Command {
  return command
    .option("--query <json>", "Query filter document as JSON")
    .option("--query-file <path>", "File containing the query filter document")
    .option("--ejson", "Parse the query as MongoDB Extended JSON");
}

export function applyLogLevel(level: LogLevel | undefined): void {
  if (level !== undefined) {
    logger.setLevel(level);
  }
}
