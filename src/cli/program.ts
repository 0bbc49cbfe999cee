/**
 * CLI program definition
 */

import { Command } from "commander";
import { createInferCommand } from "./commands/infer.js";
import { createValidateSyntaxCommand } from "./commands/validate-syntax.js";
import { createValidateCommand } from "./commands/validate.js";
import { createQueryCommand } from "./commands/query.js";

export const pkg = {
  name: "mongoprobe",
  version: "0.1.0",
  description: "Infer MongoDB collection schemas from samples and validate query filters against them",
};

export function createProgram(): Command {
  const program = new Command();

  program.name(pkg.name).description(pkg.description).version(pkg.version);

  program.addCommand(createInferCommand());
  program.addCommand(createValidateSyntaxCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createQueryCommand());

  return program;
}
