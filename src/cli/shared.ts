/**
 * Helpers shared by CLI commands
 */

import type { Command } from "commander";
import { loadConfig, type ConfigCliOptions } from "../utils/config-loader.js";
import type { RecordLoomConfig } from "../types/config.js";
import { ErrorCode, toRecordLoomError } from "../utils/errors.js";
import { parseConfigFile } from "./config/parser.js";
import type { StoreCommandOptions } from "./config/types.js";

/**
 * Add --config, --mongo-uri and --database to a command
 */
export function addStoreOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to config file (JSON or YAML)")
    .option("--mongo-uri <uri>", "MongoDB connection URI (env: RECORDLOOM_MONGO_URI)")
    .option("--database <name>", "Database name (env: RECORDLOOM_DB)");
}

/**
 * Merge CLI options, the optional config file, environment and defaults
 */
export function resolveConfig(
  options: StoreCommandOptions,
  pipelineOptions: Omit<ConfigCliOptions, "mongoUri" | "database"> = {},
): RecordLoomConfig {
  const configFile = options.config ? parseConfigFile(options.config) : {};
  const cliOptions: ConfigCliOptions = { ...pipelineOptions };
  if (options.mongoUri !== undefined) cliOptions.mongoUri = options.mongoUri;
  if (options.database !== undefined) cliOptions.database = options.database;
  return loadConfig(cliOptions, configFile);
}

export function printResult(result: unknown): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print the error response to stderr and set the exit code
 * (2 for configuration errors, 1 otherwise)
 */
export function reportCommandError(error: unknown, phase: string): void {
  const loomError = toRecordLoomError(error);
  console.error(JSON.stringify(loomError.toResponse(phase), null, 2));
  process.exitCode = loomError.code === ErrorCode.CONFIG_ERROR ? 2 : 1;
}
