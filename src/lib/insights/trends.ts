/**
 * Trend analysis of numeric fields over load time
 */

import type { Schema } from "../../types/data-model.js";
import type { RecordStore } from "../store/types.js";
import type { FieldTrend, TrendDirection, TrendOptions } from "./types.js";
import { asNumber } from "../../utils/values.js";
import { linearFit, mean, populationStdDev } from "../../utils/statistics.js";
import { logger } from "../../utils/logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const DEFAULT_OPTIONS: TrendOptions = {
  stableSlope: 0.01,
};

export function trendDirection(slope: number, stableSlope: number): TrendDirection {
  if (Math.abs(slope) < stableSlope) return "stable";
  return slope > 0 ? "increasing" : "decreasing";
}

export class TrendAnalyzer {
  private options: TrendOptions;
  private now: () => Date;

  constructor(
    private store: RecordStore,
    options: Partial<TrendOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fit a line through the field's values against days since the first load
   * in the window. Needs two numeric points.
   */
  async analyzeFieldTrend(field: string, days = 30): Promise<FieldTrend> {
    const since = new Date(this.now().getTime() - days * DAY_MS);
    const series = await this.store.findFieldSeries(field, since);

    if (series.length < 2) {
      return { status: "insufficient_data", field, periodDays: days, dataPoints: series.length };
    }

    const points: Array<{ at: number; value: number }> = [];
    for (const point of series) {
      const value = asNumber(point.value);
      if (value !== null) {
        points.push({ at: point.loadedAt.getTime(), value });
      }
    }
    const [first] = points;
    const last = points[points.length - 1];
    if (first === undefined || last === undefined || points.length < 2) {
      return { status: "non_numeric", field, periodDays: days, dataPoints: points.length };
    }

    const xs = points.map((point) => (point.at - first.at) / DAY_MS);
    const ys = points.map((point) => point.value);
    const fit = linearFit(xs, ys);
    const lastX = xs[xs.length - 1] ?? 0;

    const trend: FieldTrend = {
      status: "ok",
      field,
      trend: trendDirection(fit.slope, this.options.stableSlope),
      slope: fit.slope,
      rSquared: fit.rSquared,
      statistics: {
        mean: mean(ys),
        std: populationStdDev(ys),
        min: Math.min(...ys),
        max: Math.max(...ys),
        current: last.value,
        predictedNext: fit.intercept + fit.slope * (lastX + 1),
      },
      dataPoints: points.length,
      periodDays: days,
    };

    logger.debug("Trend analyzed", { field, trend: trend.trend, slope: fit.slope });
    return trend;
  }

  /**
   * Trends of every integer and float field of a schema
   */
  async allTrends(schema: Schema, days = 30): Promise<Record<string, FieldTrend>> {
    const trends: Record<string, FieldTrend> = {};
    for (const [field, { type }] of Object.entries(schema)) {
      if (type === "integer" || type === "float") {
        trends[field] = await this.analyzeFieldTrend(field, days);
      }
    }
    return trends;
  }
}
