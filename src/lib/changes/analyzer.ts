/**
 * Change analytics over stored change events
 */

import type { ChangeEvent } from "../../types/data-model.js";
import type { ChangeEventQuery, RecordStore } from "../store/types.js";
import type {
  ChangePatternAnalysis,
  FieldChangePattern,
  LargeChange,
} from "./types.js";
import { asNumber } from "../../utils/values.js";
import { mean, populationStdDev } from "../../utils/statistics.js";
import { logger } from "../../utils/logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;

interface NumericDelta {
  amount: number;
  percent: number;
}

/**
 * Amount and percent of a change, or null when either side is not numeric
 */
export function numericDelta(event: ChangeEvent): NumericDelta | null {
  const oldValue = asNumber(event.old_value);
  const newValue = asNumber(event.new_value);
  if (oldValue === null || newValue === null) {
    return null;
  }
  const amount = newValue - oldValue;
  const percent = oldValue !== 0 ? (amount / oldValue) * 100 : 0;
  return { amount, percent };
}

export class ChangeAnalyzer {
  private now: () => Date;

  constructor(
    private store: RecordStore,
    options: { now?: () => Date } = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private since(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS);
  }

  private async eventsSince(days: number, limit?: number): Promise<ChangeEvent[]> {
    const query: ChangeEventQuery = { since: this.since(days) };
    if (limit !== undefined) {
      query.limit = limit;
    }
    return this.store.findChangeEvents(query);
  }

  /**
   * Most recent change events, newest first
   */
  async recentChanges(days = 7, limit = 100): Promise<ChangeEvent[]> {
    return this.eventsSince(days, limit);
  }

  async analyzePatterns(days = 30): Promise<ChangePatternAnalysis> {
    const events = await this.eventsSince(days);
    if (events.length === 0) {
      return { status: "no_changes", days };
    }

    const byField = new Map<string, ChangeEvent[]>();
    for (const event of events) {
      const list = byField.get(event.field) ?? [];
      list.push(event);
      byField.set(event.field, list);
    }

    const patterns: Record<string, FieldChangePattern> = {};
    for (const [field, fieldEvents] of byField) {
      const deltas = fieldEvents
        .map(numericDelta)
        .filter((delta): delta is NumericDelta => delta !== null);

      const pattern: FieldChangePattern = {
        changeCount: fieldEvents.length,
        frequency: fieldEvents.length / days,
      };

      if (deltas.length > 0) {
        const amounts = deltas.map((delta) => delta.amount);
        pattern.averageChange = {
          amount: mean(amounts),
          percent: mean(deltas.map((delta) => delta.percent)),
        };
        pattern.volatility = populationStdDev(amounts);
      }

      patterns[field] = pattern;
    }

    logger.debug("Change pattern analysis complete", {
      days,
      totalChanges: events.length,
      fieldsChanged: byField.size,
    });

    return {
      status: "ok",
      days,
      totalChanges: events.length,
      fieldsChanged: byField.size,
      byField: patterns,
    };
  }

  /**
   * Numeric changes whose magnitude exceeds `thresholdPercent` of the old value.
   * Above 100 % the severity is high.
   */
  async findLargeChanges(thresholdPercent = 50, days = 7): Promise<LargeChange[]> {
    const events = await this.eventsSince(days);
    const large: LargeChange[] = [];

    for (const event of events) {
      const oldValue = asNumber(event.old_value);
      const delta = numericDelta(event);
      if (delta === null || oldValue === null || oldValue === 0) continue;

      const changePercent = Math.abs(delta.percent);
      if (changePercent > thresholdPercent) {
        large.push({
          ...event,
          changePercent,
          severity: changePercent > 100 ? "high" : "medium",
        });
      }
    }

    return large;
  }
}
