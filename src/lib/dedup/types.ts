/**
 * Deduplication module types
 */

import type {
  Identifier,
  IdentityKey,
  NormalizedRecord,
} from "../../types/data-model.js";

export interface DeduplicatorOptions {
  identifierFieldPriority: string[];
}

export interface NewRecord {
  identifier: Identifier | null; // null when the record carries no identity field
  identityKey: IdentityKey;
  record: NormalizedRecord;
}

export interface UpdateCandidate {
  identifier: Identifier;
  identityKey: IdentityKey;
  record: NormalizedRecord;
  existing: NormalizedRecord;
}

export type DuplicateSource = "batch" | "store";

export interface DuplicateRecord {
  identifier: Identifier | null;
  identityKey: IdentityKey;
  record: NormalizedRecord;
  source: DuplicateSource;
}

/**
 * DedupResult - every input record lands in exactly one of the three lists
 */
export interface DedupResult {
  unique: NewRecord[];
  updates: UpdateCandidate[];
  duplicates: DuplicateRecord[];
  duplicateCount: number;
}
