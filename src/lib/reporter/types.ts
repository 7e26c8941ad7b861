/**
 * Reporter module types
 */

import type { FieldType } from "../../types/data-model.js";

/**
 * LoadSummary - run summary of one upload
 */
export interface LoadSummary {
  run: {
    id: string;
    timestamp: string;
  };
  input?: {
    path: string;
    hash: string;
  };
  schema_version: number;
  total_records: number;
  total_fields: number;
  fields_by_type: Partial<Record<FieldType, number>>;
  changes_detected: number;
  duplicates_removed: number;
  inserted_records: number;
  updated_records: number;
}

export interface ReporterOptions {
  now?: () => Date;
}
