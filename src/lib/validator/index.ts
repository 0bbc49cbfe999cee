/**
 * Validator module - query filter validation, with and without a schema
 */

export * from "./types.js";
export * from "./operators.js";
export { isTypeCompatible, formatTypes, DEFAULT_MAX_QUERY_DEPTH } from "./helpers.js";
export { validateQuerySyntax } from "./syntax-validator.js";
export { validateQueryAgainstSchema } from "./schema-validator.js";
export { formatValidationOutcome, toValidationOutcome } from "./format.js";

import type { CollectionSchema, ValidationOutcome } from "../../types/data-model.js";
import { validateQueryAgainstSchema } from "./schema-validator.js";
import { validateQuerySyntax } from "./syntax-validator.js";
import { toValidationOutcome } from "./format.js";
import type { QueryValidationOptions } from "./types.js";

/**
 * Query validator bound to one collection schema
 *
 * Without a schema only the syntax pass runs. With one, a filter that fails the
 * syntax pass is reported as-is; the schema pass runs only on well-formed filters.
 */
export class QueryValidator {
  constructor(
    private readonly schema?: CollectionSchema,
    private readonly options: QueryValidationOptions = {},
  ) {}

  validateSyntax(query: unknown): ValidationOutcome {
    return toValidationOutcome(validateQuerySyntax(query, this.options));
  }

  validate(query: unknown): ValidationOutcome {
    const syntax = this.validateSyntax(query);
    if (!syntax.valid || this.schema === undefined) {
      return syntax;
    }
    return toValidationOutcome(
      validateQueryAgainstSchema(query, this.schema, this.options),
    );
  }
}
