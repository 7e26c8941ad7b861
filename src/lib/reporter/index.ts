/**
 * Reporter module - run summaries for uploads
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { FieldType, LoadResult, Schema } from "../../types/data-model.js";
import type { LoadSummary, ReporterOptions } from "./types.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export type { LoadSummary, ReporterOptions } from "./types.js";

/**
 * Count schema fields per resolved type
 */
export function countFieldsByType(schema: Schema): Partial<Record<FieldType, number>> {
  const counts: Partial<Record<FieldType, number>> = {};
  for (const field of Object.values(schema)) {
    counts[field.type] = (counts[field.type] ?? 0) + 1;
  }
  return counts;
}

/**
 * LoadReporter builds a run summary from a LoadResult, with an optional input hash
 */
export class LoadReporter {
  private now: () => Date;
  private input: LoadSummary["input"];

  constructor(options: ReporterOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Calculate SHA-256 hash of a file
   */
  async calculateFileHash(filePath: string): Promise<string> {
    try {
      const fileBuffer = await fs.readFile(filePath);
      return crypto.createHash("sha256").update(fileBuffer).digest("hex");
    } catch (error) {
      throw new FileIOError(`Failed to hash input file: ${filePath}`, { path: filePath }, { cause: error });
    }
  }

  /**
   * Record the input file the upload was read from
   */
  async setInput(inputPath: string): Promise<void> {
    const hash = await this.calculateFileHash(inputPath);
    this.input = { path: inputPath, hash };
    logger.debug("Input artifact recorded", this.input);
  }

  summarize(result: LoadResult): LoadSummary {
    const summary: LoadSummary = {
      run: {
        id: crypto.randomBytes(8).toString("hex"),
        timestamp: this.now().toISOString(),
      },
      schema_version: result.schemaVersion,
      total_records: result.totalRecords,
      total_fields: result.fieldCount,
      fields_by_type: countFieldsByType(result.schema),
      changes_detected: result.changes.length,
      duplicates_removed: result.duplicatesSkipped,
      inserted_records: result.inserted,
      updated_records: result.updated,
    };
    if (this.input) {
      summary.input = { ...this.input };
    }
    return summary;
  }

  /**
   * Save a summary as JSON; directories are created as needed
   */
  async save(summary: LoadSummary, outputPath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, JSON.stringify(summary, null, 2));
    } catch (error) {
      throw new FileIOError(`Failed to write report: ${outputPath}`, { path: outputPath }, { cause: error });
    }
    logger.info("Load report saved", { path: outputPath });
  }
}
