/**
 * Actionable recommendations from upload quality, field trends and change patterns
 */

import type { Schema } from "../../types/data-model.js";
import type { RecordStore } from "../store/types.js";
import type { QualityStats, Recommendation, RecommendationOptions } from "./types.js";
import { TrendAnalyzer } from "./trends.js";
import { ChangeAnalyzer } from "../changes/analyzer.js";
import { logger } from "../../utils/logger.js";

const DEFAULT_OPTIONS: RecommendationOptions = {
  qualityThreshold: 70,
  declineSlope: -1,
  volatilityPerDay: 5,
  trendDays: 30,
  patternDays: 7,
};

/**
 * Share of submitted records that were not duplicates, as a whole percentage
 */
export function qualityScore(stats: QualityStats): number {
  if (stats.totalRecords <= 0) return 100;
  const duplicateRatio = Math.min(stats.duplicatesSkipped / stats.totalRecords, 1);
  return Math.round(100 * (1 - duplicateRatio));
}

export class RecommendationEngine {
  private options: RecommendationOptions;
  private trends: TrendAnalyzer;
  private changes: ChangeAnalyzer;

  constructor(store: RecordStore, options: Partial<RecommendationOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const now = this.options.now;
    this.trends = new TrendAnalyzer(store, now ? { now } : {});
    this.changes = new ChangeAnalyzer(store, now ? { now } : {});
  }

  /**
   * Quality items need `stats`; trend and volatility items come from the store
   */
  async generate(schema: Schema, stats?: QualityStats): Promise<Recommendation[]> {
    const recommendations: Recommendation[] = [];
    const opts = this.options;

    if (stats && Object.keys(schema).length > 0) {
      const score = qualityScore(stats);
      if (score < opts.qualityThreshold) {
        recommendations.push({
          type: "data_quality",
          priority: "high",
          message: `Overall data quality score is ${score}%. Consider improving data validation.`,
          action: "Review and enhance data validation rules",
        });
      }
    }

    const trends = await this.trends.allTrends(schema, opts.trendDays);
    for (const [field, trend] of Object.entries(trends)) {
      if (trend.status === "ok" && trend.trend === "decreasing" && trend.slope < opts.declineSlope) {
        recommendations.push({
          type: "trend_alert",
          priority: "high",
          field,
          message: `Field "${field}" is rapidly decreasing (slope: ${trend.slope.toFixed(2)})`,
          action: "Investigate cause of decline",
        });
      }
    }

    const patterns = await this.changes.analyzePatterns(opts.patternDays);
    if (patterns.status === "ok") {
      for (const [field, pattern] of Object.entries(patterns.byField)) {
        if (pattern.frequency > opts.volatilityPerDay) {
          recommendations.push({
            type: "high_volatility",
            priority: "medium",
            field,
            message: `Field "${field}" changes ${pattern.frequency.toFixed(1)} times per day`,
            action: "Consider if this volatility is expected",
          });
        }
      }
    }

    logger.debug("Recommendations generated", { count: recommendations.length });
    return recommendations;
  }
}
