/**
 * Core data model types for RecordLoom
 * These structures flow through the pipeline: classification → inference → versioning → deduplication → change tracking → loading
 */

/**
 * RawValue - untyped scalar as produced by the record source; `undefined` means absent
 */
export type RawValue = string | number | boolean | null | undefined;

/**
 * RawRecord - one logical input row, in source order
 */
export type RawRecord = Record<string, RawValue>;

/**
 * FieldType - closed set of semantic types a field can resolve to
 */
export type FieldType =
  | "integer"
  | "float"
  | "string"
  | "email"
  | "date"
  | "url"
  | "boolean"
  | "null";

export const FIELD_TYPES: readonly FieldType[] = [
  "integer",
  "float",
  "string",
  "email",
  "date",
  "url",
  "boolean",
  "null",
];

/**
 * Conflict-resolution priority: higher outranks lower, `null` never overrides a non-null observation
 */
export const FIELD_TYPE_PRIORITY: Readonly<Record<FieldType, number>> = {
  null: 0,
  boolean: 1,
  integer: 2,
  float: 3,
  date: 4,
  email: 5,
  url: 6,
  string: 7,
};

export type NormalizedValue = string | number | boolean | null;

/**
 * NormalizedRecord - field name → normalized value. Absent fields are omitted,
 * explicit nulls are kept as `null`.
 */
export type NormalizedRecord = Record<string, NormalizedValue>;

export interface SchemaField {
  type: FieldType;
  sample_values: RawValue[];
}

/**
 * Schema - inferred field-name → type mapping with retained sample values
 */
export type Schema = Record<string, SchemaField>;

export interface SchemaVersionStats {
  total_records: number;
  total_fields: number;
}

/**
 * SchemaVersion - persisted, numbered snapshot of a structurally distinct Schema
 */
export interface SchemaVersion {
  version: number;
  schema: Schema;
  created_at: Date;
  last_used: Date;
  stats: SchemaVersionStats;
}

/**
 * Identifier - single-entry sub-mapping used to recognize the same entity across uploads
 */
export type Identifier = Record<string, NormalizedValue>;

export type ChangeType = "update";

/**
 * ChangeEvent - one monitored-field delta between a stored record and an incoming one
 */
export interface ChangeEvent {
  identifier: Identifier;
  field: string;
  old_value: NormalizedValue;
  new_value: NormalizedValue;
  change_type: ChangeType;
  timestamp: Date;
}

/**
 * IdentityKey - canonical text form of a record's identity. Built from the
 * identifier when the record has one, otherwise from the record's content.
 */
export type IdentityKey = string;

/**
 * LoadCandidate - a record headed for the store under its identity key
 */
export interface LoadCandidate {
  identityKey: IdentityKey;
  record: NormalizedRecord;
}

export type LoadStage =
  | "inference"
  | "versioning"
  | "deduplication"
  | "change-detection"
  | "persistence";

/**
 * ChunkReport - outcome of one committed chunk of an upload
 */
export interface ChunkReport {
  index: number;
  records: number;
  inserted: number;
  updated: number;
  duplicatesSkipped: number;
  changes: number;
}

/**
 * LoadResult - everything the upload/dashboard layer renders for one upload
 */
export interface LoadResult {
  inserted: number;
  updated: number;
  schemaVersion: number;
  duplicatesSkipped: number;
  changes: ChangeEvent[];
  fieldCount: number;
  totalRecords: number;
  schema: Schema;
  chunks: ChunkReport[];
}
