/**
 * MongoDB connection management with pooling
 */

import { MongoClient, type Collection, type Db } from "mongodb";
import { logger } from "../../utils/logger.js";
import { MongoConnectionError } from "../../utils/errors.js";
import type { SampleDocument } from "../../types/data-model.js";
import type { MongoConnection } from "./types.js";

export class MongoConnector {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  /**
   * Connect to MongoDB with connection pooling
   *
   * Numeric wrappers are kept (`promoteValues: false`) so Int32, Double and
   * Long values stay distinguishable to the classifier.
   */
  async connect(config: MongoConnection): Promise<void> {
    const sanitized = sanitizeUri(config.uri);
    logger.info("Connecting to MongoDB: " + sanitized);

    const client = new MongoClient(config.uri, {
      maxPoolSize: 10,
      minPoolSize: 0,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      promoteValues: false,
    });

    try {
      await client.connect();
    } catch (error) {
      logger.error("MongoDB connection failed", error);
      throw new MongoConnectionError(
        "Failed to connect to MongoDB: " +
          (error instanceof Error ? error.message : String(error)),
        { uri: sanitized },
        { cause: error },
      );
    }

    this.client = client;
    this.db = client.db(config.database);
    logger.info("Connected to database: " + config.database);
  }

  getDatabase(): Db {
    if (!this.db) {
      throw new MongoConnectionError("Not connected to MongoDB. Call connect() first.");
    }
    return this.db;
  }

  getCollection(collectionName: string): Collection<SampleDocument> {
    return this.getDatabase().collection<SampleDocument>(collectionName);
  }

  /**
   * Names of the regular collections (views and system collections excluded)
   */
  async listCollectionNames(): Promise<string[]> {
    const infos = await this.getDatabase()
      .listCollections({ type: "collection" }, { nameOnly: true })
      .toArray();
    return infos
      .map((info) => info.name)
      .filter((name) => !name.startsWith("system."))
      .sort();
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      logger.info("MongoDB connection closed");
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.db !== null;
  }
}

/**
 * Mask credentials in a connection string for logging
 */
export function sanitizeUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.username || url.password) {
      return uri.replace(/:\/\/[^@]+@/, "://***:***@");
    }
    return uri;
  } catch {
    return "mongodb://***";
  }
}

export async function createConnector(config: MongoConnection): Promise<MongoConnector> {
  const connector = new MongoConnector();
  await connector.connect(config);
  return connector;
}
