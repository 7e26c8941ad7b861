/**
 * Insights module - value distributions and summary statistics of stored records
 */

import type { Schema } from "../../types/data-model.js";
import type { RecordStore } from "../store/types.js";
import type { FieldDistribution, SummaryStatistics } from "./types.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./trends.js";
export * from "./recommendations.js";

export class DataInsights {
  constructor(private store: RecordStore) {}

  /**
   * Most frequent values of a field; records lacking it count under null
   */
  async fieldDistribution(field: string, limit = 20): Promise<FieldDistribution> {
    const values = await this.store.fieldDistribution(field, limit);
    return { field, values, totalUnique: values.length };
  }

  /**
   * Numeric fields get avg/min/max/count, every other field its distinct value count.
   * A numeric field with no stored numbers is left out.
   */
  async summaryStatistics(schema: Schema): Promise<SummaryStatistics> {
    const summary: SummaryStatistics = {
      totalRecords: await this.store.countRecords(),
      fields: {},
    };

    for (const [field, { type }] of Object.entries(schema)) {
      if (type === "integer" || type === "float") {
        const statistics = await this.store.numericSummary(field);
        if (statistics) {
          summary.fields[field] = { type, statistics };
        }
      } else {
        summary.fields[field] = { type, uniqueValues: await this.store.countDistinct(field) };
      }
    }

    logger.debug("Summary statistics computed", {
      totalRecords: summary.totalRecords,
      fields: Object.keys(summary.fields).length,
    });
    return summary;
  }
}
