/**
 * CLI configuration types
 */

/**
 * Store connection options shared by every command
 */
export interface StoreCommandOptions {
  config?: string;
  mongoUri?: string;
  database?: string;
}

/**
 * Ingest command CLI options
 */
export interface IngestCommandOptions extends StoreCommandOptions {
  input: string;
  batchSize?: number;
  monitoredFields?: string;
  identifierFields?: string;
  sampleCap?: number;
  versionRetryLimit?: number;
  report?: string;
}

/**
 * Versions command CLI options
 */
export type VersionsCommandOptions = StoreCommandOptions;

/**
 * Changes command CLI options
 */
export interface ChangesCommandOptions extends StoreCommandOptions {
  days: number;
  patternDays: number;
  limit: number;
  threshold: number;
}

/**
 * Insights command CLI options
 */
export interface InsightsCommandOptions extends StoreCommandOptions {
  schemaVersion?: number;
  days: number;
  fields?: string; // Comma-separated
  limit: number;
}
