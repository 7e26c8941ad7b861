/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { InvalidArgumentError } from "commander";
import { parse as parseYaml } from "yaml";
import type { ConfigFileSection } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Top-level shape check; field-level validation runs on the merged configuration
 */
function isConfigFileSection(value: unknown): value is ConfigFileSection {
  if (!isObject(value)) return false;
  return (
    (value.pipeline === undefined || isObject(value.pipeline)) &&
    (value.store === undefined || isObject(value.store))
  );
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): ConfigFileSection {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, { cause: error });
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isConfigFileSection(parsed)) {
    throw new ConfigError(
      `Config file must hold an object with optional "pipeline" and "store" sections: ${filePath}`,
      { filePath },
    );
  }

  logger.info("Configuration file parsed successfully", {
    hasPipelineConfig: parsed.pipeline !== undefined,
    hasStoreConfig: parsed.store !== undefined,
  });

  return parsed;
}

/**
 * Commander argument parser for non-negative integers
 */
export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

/**
 * Commander argument parser for windows and limits, which must be at least 1
 */
export function parsePositiveIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Commander argument parser for non-negative numbers
 */
export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative number.");
  }
  return parsed;
}
