/**
 * Change tracking module types
 */

import type { ChangeEvent } from "../../types/data-model.js";

export interface ChangeTrackerOptions {
  monitoredFields: string[];
  now?: () => Date;
}

export interface AverageChange {
  amount: number;
  percent: number;
}

export interface FieldChangePattern {
  changeCount: number;
  frequency: number; // Changes per day over the analysis window
  averageChange?: AverageChange; // Numeric changes only
  volatility?: number; // Population standard deviation of change amounts
}

export type ChangePatternAnalysis =
  | { status: "no_changes"; days: number }
  | {
      status: "ok";
      days: number;
      totalChanges: number;
      fieldsChanged: number;
      byField: Record<string, FieldChangePattern>;
    };

export type ChangeSeverity = "medium" | "high";

export interface LargeChange extends ChangeEvent {
  changePercent: number;
  severity: ChangeSeverity;
}
