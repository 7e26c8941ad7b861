/**
 * Configuration loader: CLI options > config file > environment > defaults
 */

import { Ajv, type JSONSchemaType } from "ajv";
import {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_STORE_CONFIG,
  type PipelineConfig,
  type RecordLoomConfig,
  type StoreCollections,
  type StoreConfig,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import { sanitizeUri } from "../lib/store/connector.js";

/**
 * CLI options that map onto configuration
 */
export interface ConfigCliOptions {
  batchSize?: number;
  monitoredFields?: string; // Comma-separated
  identifierFields?: string; // Comma-separated
  sampleCap?: number;
  versionRetryLimit?: number;
  mongoUri?: string;
  database?: string;
}

/**
 * Config file layout (JSON or YAML)
 */
export interface ConfigFileSection {
  pipeline?: Partial<PipelineConfig>;
  store?: Partial<Omit<StoreConfig, "collections">> & {
    collections?: Partial<StoreCollections>;
  };
}

export type ConfigEnv = Record<string, string | undefined>;

const stringList = { type: "array", items: { type: "string", minLength: 1 } } as const;

const CONFIG_SCHEMA: JSONSchemaType<RecordLoomConfig> = {
  type: "object",
  properties: {
    pipeline: {
      type: "object",
      properties: {
        batchSize: { type: "integer", minimum: 1 },
        monitoredFields: stringList,
        identifierFieldPriority: { ...stringList, minItems: 1 },
        sampleValueCap: { type: "integer", minimum: 0 },
        versionRetryLimit: { type: "integer", minimum: 0 },
      },
      required: [
        "batchSize",
        "monitoredFields",
        "identifierFieldPriority",
        "sampleValueCap",
        "versionRetryLimit",
      ],
      additionalProperties: false,
    },
    store: {
      type: "object",
      properties: {
        uri: { type: "string", pattern: "^mongodb(\\+srv)?://" },
        database: { type: "string", minLength: 1 },
        collections: {
          type: "object",
          properties: {
            records: { type: "string", minLength: 1 },
            schemaVersions: { type: "string", minLength: 1 },
            changes: { type: "string", minLength: 1 },
          },
          required: ["records", "schemaVersions", "changes"],
          additionalProperties: false,
        },
      },
      required: ["uri", "database", "collections"],
      additionalProperties: false,
    },
  },
  required: ["pipeline", "store"],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile(CONFIG_SCHEMA);

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseInteger(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Check a merged configuration, listing every violation
 */
export function validateConfig(config: unknown): RecordLoomConfig {
  if (validateSchema(config)) {
    return config;
  }
  const problems = (validateSchema.errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
  );
  throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, { problems });
}

/**
 * Build the effective configuration
 *
 * @example
 * const config = loadConfig({ batchSize: 500 }, { pipeline: { batchSize: 200 } });
 * // config.pipeline.batchSize === 500 (CLI takes precedence)
 */
export function loadConfig(
  cliOptions: ConfigCliOptions = {},
  configFile: ConfigFileSection = {},
  env: ConfigEnv = process.env,
): RecordLoomConfig {
  const filePipeline = configFile.pipeline ?? {};
  const fileStore = configFile.store ?? {};

  const pipeline: PipelineConfig = {
    batchSize:
      cliOptions.batchSize ??
      filePipeline.batchSize ??
      parseInteger(env.RECORDLOOM_BATCH_SIZE) ??
      DEFAULT_PIPELINE_CONFIG.batchSize,
    monitoredFields:
      parseList(cliOptions.monitoredFields) ??
      filePipeline.monitoredFields ??
      DEFAULT_PIPELINE_CONFIG.monitoredFields,
    identifierFieldPriority:
      parseList(cliOptions.identifierFields) ??
      filePipeline.identifierFieldPriority ??
      DEFAULT_PIPELINE_CONFIG.identifierFieldPriority,
    sampleValueCap:
      cliOptions.sampleCap ??
      filePipeline.sampleValueCap ??
      DEFAULT_PIPELINE_CONFIG.sampleValueCap,
    versionRetryLimit:
      cliOptions.versionRetryLimit ??
      filePipeline.versionRetryLimit ??
      DEFAULT_PIPELINE_CONFIG.versionRetryLimit,
  };

  const store: StoreConfig = {
    uri: cliOptions.mongoUri ?? fileStore.uri ?? env.RECORDLOOM_MONGO_URI ?? DEFAULT_STORE_CONFIG.uri,
    database:
      cliOptions.database ?? fileStore.database ?? env.RECORDLOOM_DB ?? DEFAULT_STORE_CONFIG.database,
    collections: {
      ...DEFAULT_STORE_CONFIG.collections,
      ...fileStore.collections,
    },
  };

  const config = validateConfig({ pipeline, store });

  logger.debug("Configuration loaded", {
    pipeline: config.pipeline,
    store: { ...config.store, uri: sanitizeUri(config.store.uri) },
  });

  return config;
}
