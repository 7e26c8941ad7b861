/**
 * Configuration types for RecordLoom
 */

/**
 * PipelineConfig - knobs of the load pipeline
 */
export interface PipelineConfig {
  batchSize: number; // Records per chunk; bounds memory only
  monitoredFields: string[]; // Fields whose value changes emit ChangeEvents
  identifierFieldPriority: string[]; // First present field wins as the identity key
  sampleValueCap: number; // Max sample values retained per schema field
  versionRetryLimit: number; // Reconcile attempts after losing a version race
}

/**
 * StoreCollections - MongoDB collection names
 */
export interface StoreCollections {
  records: string;
  schemaVersions: string;
  changes: string;
}

/**
 * StoreConfig - MongoDB connection configuration
 */
export interface StoreConfig {
  uri: string;
  database: string;
  collections: StoreCollections;
}

export interface RecordLoomConfig {
  pipeline: PipelineConfig;
  store: StoreConfig;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  batchSize: 1000,
  monitoredFields: ["price", "discount", "score", "rating", "salary"],
  identifierFieldPriority: ["id", "email", "user", "name"],
  sampleValueCap: 5,
  versionRetryLimit: 5,
};

export const DEFAULT_STORE_CONFIG: StoreConfig = {
  uri: "mongodb://localhost:27017/",
  database: "recordloom",
  collections: {
    records: "entries",
    schemaVersions: "schema_versions",
    changes: "data_changes",
  },
};
