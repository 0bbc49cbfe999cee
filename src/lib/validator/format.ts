/**
 * Human-readable rendering of validation outcomes
 */

import type { ValidationOutcome } from "../../types/data-model.js";
import type { ValidationKind } from "./types.js";

const HEADINGS: Record<ValidationKind, { valid: string; invalid: string }> = {
  syntax: {
    valid: "Syntax is valid.",
    invalid: "Syntax validation errors found:",
  },
  schema: {
    valid: "Query is valid against the schema.",
    invalid: "Schema validation errors found:",
  },
};

export function toValidationOutcome(errors: string[]): ValidationOutcome {
  return { valid: errors.length === 0, errors };
}

export function formatValidationOutcome(
  outcome: ValidationOutcome,
  kind: ValidationKind,
): string {
  const heading = HEADINGS[kind];
  if (outcome.valid) {
    return heading.valid;
  }
  return [heading.invalid, ...outcome.errors.map((e) => `- ${e}`)].join("\n");
}
