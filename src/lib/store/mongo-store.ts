/**
 * MongoDB-backed RecordStore
 */

import {
  MongoServerError,
  type AnyBulkWriteOperation,
  type BulkWriteOptions,
  type Collection,
  type Document,
  type Filter,
  type WithId,
} from "mongodb";
import type {
  ChangeEvent,
  IdentityKey,
  LoadCandidate,
  NormalizedRecord,
  NormalizedValue,
  SchemaVersion,
} from "../../types/data-model.js";
import type { StoreConfig } from "../../types/config.js";
import type {
  ChangeEventQuery,
  FieldPoint,
  NumericSummary,
  RecordStore,
  UpsertSummary,
  ValueCount,
} from "./types.js";
import { MongoConnector, createConnector } from "./connector.js";
import { StoreUnavailableError, VersionRaceLostError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const DUPLICATE_KEY_ERROR = 11000;

/** Document fields the store owns; domain field names never collide with them once encoded */
export const IDENTITY_FIELD = "_identity";
export const LOADED_AT_FIELD = "_loaded_at";

export type RecordsCollection = Pick<
  Collection<Document>,
  "createIndex" | "findOne" | "bulkWrite" | "aggregate" | "countDocuments" | "distinct" | "find"
>;
export type VersionsCollection = Pick<
  Collection<SchemaVersion>,
  "createIndex" | "find" | "insertOne" | "findOneAndUpdate"
>;
export type ChangesCollection = Pick<Collection<ChangeEvent>, "createIndex" | "find" | "insertMany">;

export interface MongoRecordStoreCollections {
  records: RecordsCollection;
  schemaVersions: VersionsCollection;
  changes: ChangesCollection;
}

export interface MongoRecordStoreOptions {
  orderedWrites?: boolean;
  /** Closed by `close()` when given */
  connector?: MongoConnector;
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === DUPLICATE_KEY_ERROR;
}

/**
 * Make a field name safe as a single top-level document key.
 * `%`, `.` and `$` are percent-escaped, as is a leading `_`.
 */
export function encodeFieldName(name: string): string {
  const escaped = name.replace(/%/g, "%25").replace(/\./g, "%2E").replace(/\$/g, "%24");
  return escaped.startsWith("_") ? `%5F${escaped.slice(1)}` : escaped;
}

export function decodeFieldName(name: string): string {
  return name.replace(/%(25|2E|24|5F)/g, (_match, code: string) =>
    String.fromCharCode(parseInt(code, 16)),
  );
}

function toScalar(value: unknown): NormalizedValue | undefined {
  if (value instanceof Date) return value.toISOString();
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return undefined;
}

/**
 * Encode the domain fields of a record and stamp the store-owned fields
 */
export function toDocument(
  identityKey: IdentityKey,
  record: NormalizedRecord,
  loadedAt: Date,
): Document {
  const doc: Document = {};
  for (const [field, value] of Object.entries(record)) {
    doc[encodeFieldName(field)] = value;
  }
  doc[IDENTITY_FIELD] = identityKey;
  doc[LOADED_AT_FIELD] = loadedAt;
  return doc;
}

/**
 * Domain fields of a stored document: store-owned fields dropped, names decoded,
 * dates as ISO text, non-scalars skipped
 */
export function fromDocument(doc: Document): NormalizedRecord {
  const record: NormalizedRecord = {};
  for (const [key, value] of Object.entries(doc)) {
    if (key === "_id" || key === IDENTITY_FIELD || key === LOADED_AT_FIELD) continue;
    const scalar = toScalar(value);
    if (scalar !== undefined) {
      record[decodeFieldName(key)] = scalar;
    }
  }
  return record;
}

function toSchemaVersion(doc: WithId<SchemaVersion>): SchemaVersion {
  return {
    version: doc.version,
    schema: doc.schema,
    created_at: doc.created_at,
    last_used: doc.last_used,
    stats: doc.stats,
  };
}

function toChangeEvent(doc: WithId<ChangeEvent>): ChangeEvent {
  return {
    identifier: doc.identifier,
    field: doc.field,
    old_value: doc.old_value,
    new_value: doc.new_value,
    change_type: doc.change_type,
    timestamp: doc.timestamp,
  };
}

export class MongoRecordStore implements RecordStore {
  private records: RecordsCollection;
  private schemaVersions: VersionsCollection;
  private changes: ChangesCollection;
  private bulkOptions: BulkWriteOptions;
  private connector: MongoConnector | undefined;

  constructor(collections: MongoRecordStoreCollections, options: MongoRecordStoreOptions = {}) {
    this.records = collections.records;
    this.schemaVersions = collections.schemaVersions;
    this.changes = collections.changes;
    this.bulkOptions = { ordered: options.orderedWrites ?? false };
    this.connector = options.connector;
  }

  /**
   * Unique version numbers back the atomic allocation step; unique identity
   * keys keep concurrent uploads of one entity in a single document
   */
  async ensureIndexes(): Promise<void> {
    await this.guard("ensureIndexes", async () => {
      await this.schemaVersions.createIndex({ version: 1 }, { unique: true });
      await this.changes.createIndex({ timestamp: -1 });
      await this.records.createIndex({ [IDENTITY_FIELD]: 1 }, { unique: true });
      await this.records.createIndex({ [LOADED_AT_FIELD]: 1 });
    });
  }

  async findSchemaVersions(): Promise<SchemaVersion[]> {
    return this.guard("findSchemaVersions", async () => {
      const docs = await this.schemaVersions.find({}).sort({ version: 1 }).toArray();
      return docs.map(toSchemaVersion);
    });
  }

  async claimSchemaVersion(version: SchemaVersion): Promise<void> {
    try {
      // Spread so the driver's _id assignment does not leak into the caller's object
      await this.schemaVersions.insertOne({ ...version });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new VersionRaceLostError(version.version, { cause: error });
      }
      throw this.wrap("claimSchemaVersion", error);
    }
  }

  async recordSchemaVersionUse(
    version: number,
    recordCount: number,
    usedAt: Date,
  ): Promise<SchemaVersion | null> {
    return this.guard("recordSchemaVersionUse", async () => {
      const updated = await this.schemaVersions.findOneAndUpdate(
        { version },
        { $set: { last_used: usedAt }, $inc: { "stats.total_records": recordCount } },
        { returnDocument: "after" },
      );
      return updated ? toSchemaVersion(updated) : null;
    });
  }

  async findByIdentityKey(key: IdentityKey): Promise<NormalizedRecord | null> {
    return this.guard("findByIdentityKey", async () => {
      const doc = await this.records.findOne({ [IDENTITY_FIELD]: key });
      return doc ? fromDocument(doc) : null;
    });
  }

  async upsertRecords(candidates: LoadCandidate[], loadedAt: Date): Promise<UpsertSummary> {
    if (candidates.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const operations: AnyBulkWriteOperation<Document>[] = candidates.map(
      ({ identityKey, record }) => ({
        updateOne: {
          filter: { [IDENTITY_FIELD]: identityKey },
          update: { $set: toDocument(identityKey, record, loadedAt) },
          upsert: true,
        },
      }),
    );

    return this.guard("upsertRecords", async () => {
      const result = await this.records.bulkWrite(operations, this.bulkOptions);
      logger.debug("Bulk write complete", {
        upserted: result.upsertedCount,
        matched: result.matchedCount,
      });
      return {
        inserted: result.upsertedCount,
        updated: result.matchedCount,
      };
    });
  }

  async appendChangeEvents(events: ChangeEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.guard("appendChangeEvents", async () => {
      await this.changes.insertMany(
        events.map((event) => ({ ...event })),
        this.bulkOptions,
      );
    });
  }

  async findChangeEvents(query: ChangeEventQuery = {}): Promise<ChangeEvent[]> {
    return this.guard("findChangeEvents", async () => {
      const filter: Filter<ChangeEvent> = query.since ? { timestamp: { $gte: query.since } } : {};
      let cursor = this.changes.find(filter).sort({ timestamp: -1 });
      if (query.limit !== undefined) {
        cursor = cursor.limit(query.limit);
      }
      const docs = await cursor.toArray();
      return docs.map(toChangeEvent);
    });
  }

  async countRecords(): Promise<number> {
    return this.guard("countRecords", () => this.records.countDocuments({}));
  }

  async fieldDistribution(field: string, limit: number): Promise<ValueCount[]> {
    const path = encodeFieldName(field);
    return this.guard("fieldDistribution", async () => {
      const groups = await this.records
        .aggregate<{ _id: unknown; count: number }>([
          { $group: { _id: `$${path}`, count: { $sum: 1 } } },
          { $sort: { count: -1 } },
          { $limit: limit },
        ])
        .toArray();
      return groups.map((group) => ({ value: toScalar(group._id) ?? null, count: group.count }));
    });
  }

  async numericSummary(field: string): Promise<NumericSummary | null> {
    const path = encodeFieldName(field);
    return this.guard("numericSummary", async () => {
      const [summary] = await this.records
        .aggregate<NumericSummary>([
          { $match: { [path]: { $type: "number" } } },
          {
            $group: {
              _id: null,
              avg: { $avg: `$${path}` },
              min: { $min: `$${path}` },
              max: { $max: `$${path}` },
              count: { $sum: 1 },
            },
          },
          { $project: { _id: 0, avg: 1, min: 1, max: 1, count: 1 } },
        ])
        .toArray();
      return summary ?? null;
    });
  }

  async countDistinct(field: string): Promise<number> {
    const path = encodeFieldName(field);
    return this.guard("countDistinct", async () => {
      const values = await this.records.distinct(path, { [path]: { $exists: true } });
      return values.length;
    });
  }

  async findFieldSeries(field: string, since: Date): Promise<FieldPoint[]> {
    const path = encodeFieldName(field);
    return this.guard("findFieldSeries", async () => {
      const docs = await this.records
        .find({ [LOADED_AT_FIELD]: { $gte: since }, [path]: { $ne: null } })
        .sort({ [LOADED_AT_FIELD]: 1 })
        .toArray();
      const points: FieldPoint[] = [];
      for (const doc of docs) {
        const loadedAt: unknown = doc[LOADED_AT_FIELD];
        const value = toScalar(doc[path]);
        if (loadedAt instanceof Date && value !== undefined && value !== null) {
          points.push({ loadedAt, value });
        }
      }
      return points;
    });
  }

  async close(): Promise<void> {
    if (this.connector) {
      await this.connector.close();
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrap(operation, error);
    }
  }

  private wrap(operation: string, error: unknown): StoreUnavailableError {
    logger.error(`Store operation failed: ${operation}`, error);
    return new StoreUnavailableError(
      `Store operation ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      { operation },
      { cause: error },
    );
  }
}

/**
 * Factory function for creating a connected MongoRecordStore
 */
export async function createMongoRecordStore(
  config: StoreConfig,
  options: Omit<MongoRecordStoreOptions, "connector"> = {},
): Promise<MongoRecordStore> {
  const connector = await createConnector(config);
  const store = new MongoRecordStore(
    {
      records: connector.getCollection(config.collections.records),
      schemaVersions: connector.getCollection<SchemaVersion>(config.collections.schemaVersions),
      changes: connector.getCollection<ChangeEvent>(config.collections.changes),
    },
    { ...options, connector },
  );
  await store.ensureIndexes();
  return store;
}
