/**
 * Record source - reads JSON array and NDJSON files into raw records
 */

import { createReadStream } from "fs";
import fs from "fs/promises";
import path from "path";
import * as readline from "readline";
import type { RawRecord, RawValue } from "../../types/data-model.js";
import { FileIOError, InputReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export type InputFormat = "json" | "ndjson";

const FORMATS_BY_EXTENSION: Record<string, InputFormat> = {
  ".json": "json",
  ".ndjson": "ndjson",
  ".jsonl": "ndjson",
};

export function detectFormat(filePath: string): InputFormat {
  const format = FORMATS_BY_EXTENSION[path.extname(filePath).toLowerCase()];
  if (!format) {
    throw new InputReadError(
      `Unsupported input format: ${filePath}. Must be .json, .ndjson, or .jsonl`,
      { path: filePath },
    );
  }
  return format;
}

/**
 * Scalars pass through; nested objects and arrays become their JSON text
 */
export function toRawValue(value: unknown): RawValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return JSON.stringify(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert one parsed JSON value into a RawRecord
 */
export function toRawRecord(value: unknown, location: string): RawRecord {
  if (!isPlainObject(value)) {
    throw new InputReadError(`Expected a JSON object at ${location}`, { location });
  }
  const record: RawRecord = {};
  for (const [field, fieldValue] of Object.entries(value)) {
    record[field] = toRawValue(fieldValue);
  }
  return record;
}

function parseJson(text: string, location: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputReadError(`Invalid JSON at ${location}`, { location }, { cause: error });
  }
}

async function readJsonArray(filePath: string): Promise<RawRecord[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read input file: ${filePath}`, { path: filePath }, { cause: error });
  }

  const parsed = parseJson(content, filePath);
  // A single object is an upload of one record
  const items = Array.isArray(parsed) ? parsed : [parsed];
  return items.map((item, index) => toRawRecord(item, `${filePath}[${index}]`));
}

async function readNdjson(filePath: string): Promise<RawRecord[]> {
  const records: RawRecord[] = [];
  const rl = readline.createInterface({
    input: createReadStream(filePath, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of rl) {
      lineNumber++;
      const trimmed = line.trim();
      if (trimmed === "") continue;
      const location = `${filePath}:${lineNumber}`;
      records.push(toRawRecord(parseJson(trimmed, location), location));
    }
  } catch (error) {
    if (error instanceof InputReadError) throw error;
    throw new FileIOError(`Failed to read input file: ${filePath}`, { path: filePath }, { cause: error });
  } finally {
    rl.close();
  }

  return records;
}

/**
 * Read every record of a JSON array or NDJSON file, in file order
 */
export async function readRecords(filePath: string): Promise<RawRecord[]> {
  const format = detectFormat(filePath);
  logger.info("Reading records", { path: filePath, format });

  const records = format === "json" ? await readJsonArray(filePath) : await readNdjson(filePath);

  logger.info("Records read", { path: filePath, count: records.length });
  return records;
}
