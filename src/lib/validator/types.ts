/**
 * Validator module types
 */

export interface QueryValidationOptions {
  /** Deepest filter nesting inspected before reporting an error */
  maxDepth?: number;
}

export type ValidationKind = "syntax" | "schema";
