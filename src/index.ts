/**
 * RecordLoom: schema-versioned, deduplicating loader for loosely-typed records
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/classifier/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/versioning/index.js";
export * from "./lib/dedup/index.js";
export * from "./lib/changes/index.js";
export * from "./lib/insights/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/store/connector.js";
export * from "./lib/store/mongo-store.js";
export * from "./lib/reporter/index.js";
export * from "./lib/source/json-reader.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
