/**
 * Collection-level schema aggregation
 *
 * Folds the inferred field maps of sampled documents into one snapshot.
 * A document that is not a document, or whose processing fails, is skipped
 * with a diagnostic; the rest of the sample still contributes.
 */

import type { CollectionSchema, SchemaNode } from "../../types/data-model.js";
import { isPlainDocument } from "../classifier/index.js";
import { logger } from "../../utils/logger.js";
import { mergeSchemaNodes } from "./merge.js";
import { recordDiagnostic } from "./schema-node.js";
import { DEFAULT_MAX_DEPTH, inferValueSchema } from "./schema-inferrer.js";
import type { AggregateOptions, AggregationResult } from "./types.js";

/**
 * Label for diagnostics; an `_id` that cannot be read or printed is left out
 */
function describeDocument(document: unknown, index: number): string {
  if (!isPlainDocument(document)) {
    return `#${index}`;
  }
  try {
    const id = document._id;
    return id === undefined ? `#${index}` : `#${index} (_id: ${String(id)})`;
  } catch {
    return `#${index}`;
  }
}

/**
 * Incremental builder for a collection schema
 */
export class CollectionSchemaBuilder {
  private fields = new Map<string, SchemaNode>();
  private diagnostics: string[] = [];
  private analyzed = 0;
  private skipped = 0;
  private readonly maxDepth: number;

  constructor(options: AggregateOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Fold one document into the running schema. Returns false when it was skipped.
   */
  add(document: unknown): boolean {
    const index = this.analyzed + this.skipped;
    const label = describeDocument(document, index);

    if (!isPlainDocument(document)) {
      this.skip(`Skipping document ${label}: expected a document.`);
      return false;
    }

    try {
      const docDiagnostics: string[] = [];
      const docSchema = inferValueSchema(document, {
        maxDepth: this.maxDepth,
        diagnostics: docDiagnostics,
      });
      const inner = docSchema.objectSchema;
      if (inner === undefined) {
        this.skip(`Skipping document ${label}: inference produced no field map.`);
        return false;
      }

      // Commit only once the whole document has merged cleanly
      const next = new Map(this.fields);
      for (const [key, fieldSchema] of inner) {
        const existing = next.get(key);
        next.set(
          key,
          existing === undefined
            ? fieldSchema
            : mergeSchemaNodes(existing, fieldSchema, docDiagnostics, key),
        );
      }

      this.fields = next;
      this.diagnostics.push(...docDiagnostics);
      this.analyzed++;
      return true;
    } catch (error) {
      this.skip(
        `Error processing schema for document ${label}: ${error instanceof Error ? error.message : String(error)}. Skipping document.`,
      );
      return false;
    }
  }

  addAll(documents: Iterable<unknown>): this {
    for (const document of documents) {
      this.add(document);
    }
    return this;
  }

  build(): AggregationResult {
    return {
      schema: new Map(this.fields),
      diagnostics: [...this.diagnostics],
      documentsAnalyzed: this.analyzed,
      documentsSkipped: this.skipped,
    };
  }

  private skip(message: string): void {
    this.skipped++;
    recordDiagnostic(this.diagnostics, message);
  }
}

/**
 * Aggregate already-sampled documents into a collection schema.
 * An empty sample yields an empty schema.
 */
export function aggregateCollectionSchema(
  documents: Iterable<unknown>,
  options: AggregateOptions = {},
): AggregationResult {
  const result = new CollectionSchemaBuilder(options).addAll(documents).build();

  logger.debug("Collection schema aggregated", {
    fields: result.schema.size,
    documentsAnalyzed: result.documentsAnalyzed,
    documentsSkipped: result.documentsSkipped,
  });

  return result;
}

/**
 * Shorthand returning only the schema snapshot
 */
export function inferCollectionSchema(
  documents: Iterable<unknown>,
  options: AggregateOptions = {},
): CollectionSchema {
  return aggregateCollectionSchema(documents, options).schema;
}
