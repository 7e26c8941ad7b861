// Core re-exports for the RecordLoom type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/classifier/types.js";
export * from "../lib/inferencer/types.js";
export * from "../lib/dedup/types.js";
export * from "../lib/store/types.js";
export * from "../lib/changes/types.js";
export * from "../lib/reporter/types.js";
