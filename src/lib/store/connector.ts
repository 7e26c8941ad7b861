/**
 * MongoDB connection management with pooling
 */

import { MongoClient, type Collection, type Db, type Document } from "mongodb";
import { logger } from "../../utils/logger.js";
import { StoreUnavailableError } from "../../utils/errors.js";
import type { StoreConfig } from "../../types/config.js";

export class MongoConnector {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  /**
   * Connect to MongoDB with connection pooling
   */
  async connect(config: Pick<StoreConfig, "uri" | "database">): Promise<void> {
    try {
      const sanitized = sanitizeUri(config.uri);
      logger.info("Connecting to MongoDB: " + sanitized);

      this.client = new MongoClient(config.uri, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
      });

      await this.client.connect();
      this.db = this.client.db(config.database);

      logger.info("Connected to database: " + config.database);
    } catch (error) {
      logger.error("MongoDB connection failed", error);
      throw new StoreUnavailableError(
        "Failed to connect to MongoDB: " + (error instanceof Error ? error.message : String(error)),
        { uri: sanitizeUri(config.uri), database: config.database },
        { cause: error },
      );
    }
  }

  /**
   * Get collection instance
   */
  getCollection<T extends Document = Document>(collectionName: string): Collection<T> {
    if (!this.db) {
      throw new StoreUnavailableError("Not connected to MongoDB. Call connect() first.");
    }

    return this.db.collection<T>(collectionName);
  }

  /**
   * Close connection
   */
  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      logger.info("MongoDB connection closed");
    }
  }
}

/**
 * Sanitize URI for logging (remove credentials)
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

/**
 * Factory function for creating connector instances
 */
export async function createConnector(
  config: Pick<StoreConfig, "uri" | "database">,
): Promise<MongoConnector> {
  const connector = new MongoConnector();
  await connector.connect(config);
  return connector;
}
