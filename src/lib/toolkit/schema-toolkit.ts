/**
 * SchemaToolkit - schema discovery, query validation and execution bound to one database
 */

import type {
  CollectionSchema,
  DatabaseSchema,
  SampleDocument,
  ValidationOutcome,
} from "../../types/data-model.js";
import { ConfigError, ExecutionError, SchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { aggregateCollectionSchema, DEFAULT_MAX_DEPTH } from "../inferencer/index.js";
import { createConnector, createStrategy, type SamplingStrategy } from "../sampler/index.js";
import {
  toValidationOutcome,
  validateQueryAgainstSchema,
  validateQuerySyntax,
} from "../validator/index.js";
import { executeFindQuery, type FindRequest, type FindResult } from "../executor/index.js";
import type { DataSource, SchemaRequest, ToolkitConfig } from "./types.js";

export const DEFAULT_SAMPLE_SIZE = 100;

export class SchemaToolkit {
  private source: Promise<DataSource> | null = null;
  private readonly strategy: SamplingStrategy;
  private readonly maxDepth: number;
  private readonly schemaCache = new Map<string, CollectionSchema>();

  /**
   * @param dataSource - already-open source to use instead of connecting to `config.uri`
   */
  constructor(
    private readonly config: ToolkitConfig,
    dataSource?: DataSource,
  ) {
    if (!config.uri && dataSource === undefined) {
      throw new ConfigError("MongoDB URI cannot be empty.");
    }
    if (!config.database) {
      throw new ConfigError("Database name cannot be empty.");
    }
    this.strategy = createStrategy(config.strategy ?? "firstN");
    this.maxDepth = config.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (dataSource !== undefined) {
      this.source = Promise.resolve(dataSource);
    }
  }

  /**
   * Connect on first use; a failed attempt is forgotten so the next call retries
   */
  private getSource(): Promise<DataSource> {
    if (this.source === null) {
      this.source = createConnector({
        uri: this.config.uri,
        database: this.config.database,
      }).catch((error: unknown) => {
        this.source = null;
        throw error;
      });
    }
    return this.source;
  }

  /**
   * Infer schemas for one collection or the whole database.
   * Collections whose sample is empty are left out.
   */
  async getDatabaseSchema(request: SchemaRequest = {}): Promise<DatabaseSchema> {
    const source = await this.getSource();
    const sampleSize = request.sampleSize ?? this.config.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    if (!Number.isInteger(sampleSize) || sampleSize <= 0) {
      throw new SchemaError("Sample size must be a positive integer.", { sampleSize });
    }

    const available = await source.listCollectionNames();
    let names: string[];
    if (request.collection !== undefined) {
      if (!available.includes(request.collection)) {
        throw new SchemaError(
          `Collection '${request.collection}' not found in database '${this.config.database}'.`,
        );
      }
      names = [request.collection];
    } else {
      names = available;
      if (names.length === 0) {
        logger.info("Database contains no collections", { database: this.config.database });
      }
    }

    const inferred: Array<[string, CollectionSchema]> = [];
    for (const name of names) {
      const schema = await this.inferCollection(source, name, sampleSize);
      if (schema !== undefined) {
        inferred.push([name, schema]);
      }
    }
    return Object.fromEntries(inferred);
  }

  private async inferCollection(
    source: DataSource,
    name: string,
    sampleSize: number,
  ): Promise<CollectionSchema | undefined> {
    logger.info("Analyzing collection", { collection: name, sampleSize });

    let documents: SampleDocument[];
    try {
      documents = await this.strategy.sample(source.getCollection(name), sampleSize);
    } catch (error) {
      throw new SchemaError(
        `Failed to sample collection '${name}': ` +
          (error instanceof Error ? error.message : String(error)),
        { collection: name },
        { cause: error },
      );
    }

    if (documents.length === 0) {
      logger.warn("Collection is empty or sampling returned no documents", {
        collection: name,
      });
      return undefined;
    }

    const result = aggregateCollectionSchema(documents, { maxDepth: this.maxDepth });
    if (result.documentsAnalyzed === 0) {
      logger.warn("No documents could be analyzed", { collection: name });
      return undefined;
    }

    this.schemaCache.set(name, result.schema);
    return result.schema;
  }

  validateQuerySyntax(query: unknown): ValidationOutcome {
    return toValidationOutcome(validateQuerySyntax(query, { maxDepth: this.maxDepth }));
  }

  /**
   * Validate a filter against a collection's schema, sampling it when not cached
   */
  async validateQuery(
    query: unknown,
    target: string | CollectionSchema,
  ): Promise<ValidationOutcome> {
    const schema = typeof target === "string" ? await this.schemaFor(target) : target;
    return toValidationOutcome(
      validateQueryAgainstSchema(query, schema, { maxDepth: this.maxDepth }),
    );
  }

  private async schemaFor(collection: string): Promise<CollectionSchema> {
    const cached = this.schemaCache.get(collection);
    if (cached !== undefined) {
      return cached;
    }
    const schema = (await this.getDatabaseSchema({ collection }))[collection];
    if (schema === undefined) {
      throw new SchemaError(
        `No documents sampled from collection '${collection}'; cannot infer a schema.`,
      );
    }
    return schema;
  }

  async executeQuery(collection: string, request: FindRequest): Promise<FindResult> {
    if (!collection) {
      throw new ExecutionError("Collection name cannot be empty.");
    }
    const source = await this.getSource();
    logger.info("Executing find query", {
      database: this.config.database,
      collection,
    });
    const result = await executeFindQuery(source.getCollection(collection), request);
    logger.info("Query executed", { count: result.count });
    return result;
  }

  async close(): Promise<void> {
    const pending = this.source;
    this.source = null;
    this.schemaCache.clear();
    if (pending !== null) {
      const source = await pending;
      await source.close();
    }
  }
}
