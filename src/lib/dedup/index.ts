/**
 * Deduplication module - splits a batch into new, duplicate and changed records
 */

import type { NormalizedRecord } from "../../types/data-model.js";
import type { RecordStore } from "../store/types.js";
import type { DedupResult, DeduplicatorOptions } from "./types.js";
import { buildIdentifier, identityKey } from "./identity.js";
import { hasField, valuesEqual } from "../../utils/values.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./identity.js";

/**
 * True when every field of the incoming record holds the same value in the stored one
 */
export function isExactDuplicate(existing: NormalizedRecord, incoming: NormalizedRecord): boolean {
  return Object.entries(incoming).every(
    ([field, value]) => hasField(existing, field) && valuesEqual(existing[field], value),
  );
}

/**
 * Deduplicator for one upload. Identity keys seen by earlier `filter` calls
 * (earlier chunks of the same upload) count as in-batch duplicates.
 */
export class Deduplicator {
  private seen = new Set<string>();
  private priority: string[];

  constructor(
    private store: RecordStore,
    options: DeduplicatorOptions,
  ) {
    this.priority = options.identifierFieldPriority;
  }

  async filter(batch: NormalizedRecord[]): Promise<DedupResult> {
    const result: DedupResult = { unique: [], updates: [], duplicates: [], duplicateCount: 0 };

    for (const record of batch) {
      const identifier = buildIdentifier(record, this.priority);
      const key = identityKey(record, identifier);

      if (this.seen.has(key)) {
        result.duplicates.push({ identifier, identityKey: key, record, source: "batch" });
        continue;
      }
      this.seen.add(key);

      const existing = await this.store.findByIdentityKey(key);
      if (!existing) {
        result.unique.push({ identifier, identityKey: key, record });
      } else if (!identifier || isExactDuplicate(existing, record)) {
        // A content-keyed match holds the same content by construction
        result.duplicates.push({ identifier, identityKey: key, record, source: "store" });
      } else {
        result.updates.push({ identifier, identityKey: key, record, existing });
      }
    }

    result.duplicateCount = result.duplicates.length;

    if (result.duplicateCount > 0) {
      logger.info("Removed duplicates from batch", { duplicates: result.duplicateCount });
    }
    logger.debug("Deduplication complete", {
      unique: result.unique.length,
      updates: result.updates.length,
      duplicates: result.duplicateCount,
    });

    return result;
  }
}
