/**
 * Validate-syntax command - structural check of a query filter, no database needed
 */

import { Command, InvalidArgumentError } from "commander";
import {
  formatValidationOutcome,
  toValidationOutcome,
  validateQuerySyntax,
} from "../../lib/validator/index.js";
import type { ValidationOutcome } from "../../types/data-model.js";
import type { OutputFormat, ValidateSyntaxCommandOptions } from "../config/types.js";
import {
  addCommonOptions,
  addQueryInputOptions,
  applyLogLevel,
  emitResult,
  loadCommandConfig,
  parsePositiveInt,
  readQueryInput,
  runCommand,
  successResult,
  type CommandContext,
  type CommandResult,
} from "../shared.js";

export function outcomeResult(
  outcome: ValidationOutcome,
  kind: "syntax" | "schema",
  format: OutputFormat,
  extra: Record<string, unknown> = {},
): CommandResult {
  const exitCode = outcome.valid ? 0 : 1;
  if (format === "text") {
    return { exitCode, stdout: formatValidationOutcome(outcome, kind) };
  }
  return successResult(
    { status: "success", phase: `${kind}-validation`, ...extra, ...outcome },
    exitCode,
  );
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value !== "json" && value !== "text") {
    throw new InvalidArgumentError("Must be one of: json, text.");
  }
  return value;
}

export async function executeValidateSyntax(
  options: ValidateSyntaxCommandOptions,
  context: CommandContext = {},
): Promise<CommandResult> {
  return runCommand("syntax-validation", async () => {
    applyLogLevel(options.logLevel);
    const config = loadCommandConfig(options.config, { maxDepth: options.maxDepth }, context.env);

    const query = await readQueryInput(options, context.stdin);
    const outcome = toValidationOutcome(
      validateQuerySyntax(query, { maxDepth: config.validation.maxDepth }),
    );
    return outcomeResult(outcome, "syntax", options.format ?? "json");
  });
}

export function createValidateSyntaxCommand(): Command {
  const command = new Command("validate-syntax");

  command.description("Check the structure of a query filter document without a schema");
  addQueryInputOptions(command)
    .option("--max-depth <n>", "Maximum query nesting depth inspected", parsePositiveInt)
    .option("--format <format>", "Output format: json, text", parseOutputFormat, "json");
  addCommonOptions(command).action(async (options: ValidateSyntaxCommandOptions) => {
    emitResult(await executeValidateSyntax(options));
  });

  return command;
}
