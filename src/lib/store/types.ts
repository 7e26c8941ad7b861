/**
 * Store module types - the persistence boundary of the pipeline
 */

import type {
  ChangeEvent,
  IdentityKey,
  LoadCandidate,
  NormalizedRecord,
  NormalizedValue,
  SchemaVersion,
} from "../../types/data-model.js";

export interface ChangeEventQuery {
  since?: Date;
  limit?: number;
}

export interface UpsertSummary {
  inserted: number;
  updated: number;
}

/**
 * How often one value occurs in a field; records lacking the field count under null
 */
export interface ValueCount {
  value: NormalizedValue;
  count: number;
}

export interface NumericSummary {
  avg: number;
  min: number;
  max: number;
  count: number;
}

/**
 * One non-null field value and the time its record was last loaded
 */
export interface FieldPoint {
  loadedAt: Date;
  value: NormalizedValue;
}

/**
 * RecordStore - document store consumed by the pipeline.
 * Every method may reject with StoreUnavailableError.
 */
export interface RecordStore {
  findSchemaVersions(): Promise<SchemaVersion[]>;

  /**
   * Insert a brand-new version. Rejects with VersionRaceLostError when the
   * version number is already taken; this is the allocation serialization point.
   */
  claimSchemaVersion(version: SchemaVersion): Promise<void>;

  /**
   * Atomically bump `last_used` and `stats.total_records` of an existing version
   */
  recordSchemaVersionUse(
    version: number,
    recordCount: number,
    usedAt: Date,
  ): Promise<SchemaVersion | null>;

  /**
   * Domain fields of the record stored under an identity key
   */
  findByIdentityKey(key: IdentityKey): Promise<NormalizedRecord | null>;

  /**
   * Insert or replace-by-merge each candidate under its identity key, stamping `loadedAt`
   */
  upsertRecords(candidates: LoadCandidate[], loadedAt: Date): Promise<UpsertSummary>;

  appendChangeEvents(events: ChangeEvent[]): Promise<void>;

  /**
   * Newest first
   */
  findChangeEvents(query?: ChangeEventQuery): Promise<ChangeEvent[]>;

  countRecords(): Promise<number>;

  /**
   * Most frequent values first; ties in store order
   */
  fieldDistribution(field: string, limit: number): Promise<ValueCount[]>;

  /**
   * Over numeric values only; null when the field holds none
   */
  numericSummary(field: string): Promise<NumericSummary | null>;

  /**
   * Distinct values among records that have the field
   */
  countDistinct(field: string): Promise<number>;

  /**
   * Non-null values of a field in records loaded since `since`, oldest load first
   */
  findFieldSeries(field: string, since: Date): Promise<FieldPoint[]>;
}
