/**
 * Insights module types
 */

import type { FieldType } from "../../types/data-model.js";
import type { NumericSummary, ValueCount } from "../store/types.js";

export type TrendDirection = "stable" | "increasing" | "decreasing";

export interface TrendStatistics {
  mean: number;
  std: number; // Population standard deviation
  min: number;
  max: number;
  current: number; // Most recently loaded value
  predictedNext: number; // Fitted value one day after the last point
}

export type FieldTrend =
  | { status: "insufficient_data"; field: string; periodDays: number; dataPoints: number }
  | { status: "non_numeric"; field: string; periodDays: number; dataPoints: number }
  | {
      status: "ok";
      field: string;
      trend: TrendDirection;
      slope: number; // Units per day
      rSquared: number;
      statistics: TrendStatistics;
      dataPoints: number;
      periodDays: number;
    };

export interface TrendOptions {
  /** Slopes with a smaller magnitude count as stable */
  stableSlope: number;
  now?: () => Date;
}

export interface FieldDistribution {
  field: string;
  values: ValueCount[];
  totalUnique: number; // Distinct values among those listed
}

export type FieldSummary =
  | { type: FieldType; statistics: NumericSummary }
  | { type: FieldType; uniqueValues: number };

export interface SummaryStatistics {
  totalRecords: number;
  fields: Record<string, FieldSummary>;
}

export type RecommendationType = "data_quality" | "trend_alert" | "high_volatility";

export type RecommendationPriority = "high" | "medium";

export interface Recommendation {
  type: RecommendationType;
  priority: RecommendationPriority;
  message: string;
  action: string;
  field?: string;
}

/**
 * Upload counts the quality score is computed from
 */
export interface QualityStats {
  totalRecords: number;
  duplicatesSkipped: number;
}

export interface RecommendationOptions {
  qualityThreshold: number; // Scores below this raise a data_quality item
  declineSlope: number; // Decreasing trends steeper than this raise a trend_alert
  volatilityPerDay: number; // Change frequencies above this raise a high_volatility item
  trendDays: number;
  patternDays: number;
  now?: () => Date;
}
