/**
 * Change tracking module - monitored-field deltas between stored and incoming records
 */

import type {
  ChangeEvent,
  Identifier,
  NormalizedRecord,
} from "../../types/data-model.js";
import type { ChangeTrackerOptions } from "./types.js";
import { hasField, valuesEqual } from "../../utils/values.js";

export * from "./types.js";
export * from "./analyzer.js";

export class ChangeTracker {
  private monitoredFields: string[];
  private now: () => Date;

  constructor(options: ChangeTrackerOptions) {
    this.monitoredFields = options.monitoredFields;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * One event per monitored field present in both records whose value differs.
   * A field present on only one side is schema evolution, not a change.
   */
  detect(existing: NormalizedRecord, incoming: NormalizedRecord, identifier: Identifier): ChangeEvent[] {
    const timestamp = this.now();
    const events: ChangeEvent[] = [];

    for (const field of this.monitoredFields) {
      if (!hasField(existing, field) || !hasField(incoming, field)) continue;

      const oldValue = existing[field] ?? null;
      const newValue = incoming[field] ?? null;
      if (valuesEqual(oldValue, newValue)) continue;

      events.push({
        identifier,
        field,
        old_value: oldValue,
        new_value: newValue,
        change_type: "update",
        timestamp,
      });
    }

    return events;
  }
}

/**
 * Incoming values win; stored fields the upload lacks are kept
 */
export function mergeRecords(existing: NormalizedRecord, incoming: NormalizedRecord): NormalizedRecord {
  return { ...existing, ...incoming };
}
