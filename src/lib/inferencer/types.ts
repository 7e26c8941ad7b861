/**
 * Inferencer module types
 */

import type {
  FieldType,
  NormalizedRecord,
  RawValue,
  Schema,
} from "../../types/data-model.js";
import type { TypeClassifier } from "../classifier/index.js";

export interface InferencerOptions {
  sampleValueCap: number;
  /** Fields that identify a record; their "1"/"0" tokens never resolve to boolean */
  identityFields?: readonly string[];
  classifier?: TypeClassifier;
}

/**
 * FieldObservation - everything seen for one field across a batch
 */
export interface FieldObservation {
  types: Set<FieldType>; // Non-null, unambiguous observations
  ambiguousCount: number; // "1"/"0" tokens
  nullCount: number;
  presentCount: number;
  samples: RawValue[];
}

export interface InferencerResult {
  schema: Schema;
  records: NormalizedRecord[];
  metadata: {
    recordsAnalyzed: number;
    fieldsDiscovered: number;
    conflictsResolved: number;
  };
}
