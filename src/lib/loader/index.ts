/**
 * Loader module - runs one upload through inference, versioning, deduplication,
 * change tracking and persistence
 */

import type {
  ChangeEvent,
  ChunkReport,
  LoadCandidate,
  LoadResult,
  LoadStage,
  RawRecord,
} from "../../types/data-model.js";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../../types/config.js";
import type { RecordStore } from "../store/types.js";
import { SchemaInferrer } from "../inferencer/index.js";
import { SchemaVersionStore } from "../versioning/index.js";
import { Deduplicator } from "../dedup/index.js";
import { ChangeTracker, mergeRecords } from "../changes/index.js";
import { chunk } from "../../utils/chunk.js";
import { BatchFailedError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface BatchLoaderOptions {
  now?: () => Date;
}

export class BatchLoader {
  private config: PipelineConfig;
  private now: () => Date;
  private inferrer: SchemaInferrer;
  private versions: SchemaVersionStore;
  private tracker: ChangeTracker;

  constructor(
    private store: RecordStore,
    config: Partial<PipelineConfig> = {},
    options: BatchLoaderOptions = {},
  ) {
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
    this.now = options.now ?? (() => new Date());
    this.inferrer = new SchemaInferrer({
      sampleValueCap: this.config.sampleValueCap,
      identityFields: this.config.identifierFieldPriority,
    });
    this.versions = new SchemaVersionStore(store, {
      retryLimit: this.config.versionRetryLimit,
      now: this.now,
    });
    this.tracker = new ChangeTracker({
      monitoredFields: this.config.monitoredFields,
      now: this.now,
    });
  }

  /**
   * Load one upload. Chunks commit one after another; a failure stops the upload
   * with a BatchFailedError listing the chunks already committed.
   */
  async process(rawBatch: RawRecord[]): Promise<LoadResult> {
    const startTime = Date.now();
    const result: LoadResult = {
      inserted: 0,
      updated: 0,
      schemaVersion: 0,
      duplicatesSkipped: 0,
      changes: [],
      fieldCount: 0,
      totalRecords: rawBatch.length,
      schema: {},
      chunks: [],
    };

    let stage: LoadStage = "inference";
    try {
      const { schema, records } = this.inferrer.infer(rawBatch);
      result.schema = schema;
      result.fieldCount = Object.keys(schema).length;

      if (rawBatch.length === 0) {
        logger.warn("Empty upload, nothing to load");
        return result;
      }
      const chunks = chunk(records, this.config.batchSize);

      stage = "versioning";
      const version = await this.versions.reconcile(schema, rawBatch.length);
      result.schemaVersion = version.version;

      const deduplicator = new Deduplicator(this.store, {
        identifierFieldPriority: this.config.identifierFieldPriority,
      });

      for (const [index, chunkRecords] of chunks.entries()) {
        stage = "deduplication";
        const dedup = await deduplicator.filter(chunkRecords);

        stage = "change-detection";
        const changes: ChangeEvent[] = [];
        const candidates: LoadCandidate[] = dedup.unique.map(({ identityKey, record }) => ({
          identityKey,
          record,
        }));
        for (const update of dedup.updates) {
          changes.push(...this.tracker.detect(update.existing, update.record, update.identifier));
          candidates.push({
            identityKey: update.identityKey,
            record: mergeRecords(update.existing, update.record),
          });
        }

        stage = "persistence";
        const written = await this.store.upsertRecords(candidates, this.now());
        await this.store.appendChangeEvents(changes);

        const report: ChunkReport = {
          index,
          records: chunkRecords.length,
          inserted: written.inserted,
          updated: written.updated,
          duplicatesSkipped: dedup.duplicateCount,
          changes: changes.length,
        };
        result.chunks.push(report);
        result.inserted += written.inserted;
        result.updated += written.updated;
        result.duplicatesSkipped += dedup.duplicateCount;
        result.changes.push(...changes);

        logger.debug("Chunk committed", report);
      }
    } catch (error) {
      logger.error(`Upload failed during ${stage}`, error);
      throw new BatchFailedError(stage, result.chunks, { cause: error });
    }

    if (result.changes.length > 0) {
      logger.info("Detected changes in data", { changes: result.changes.length });
    }
    logger.info("Upload loaded", {
      schemaVersion: result.schemaVersion,
      totalRecords: result.totalRecords,
      inserted: result.inserted,
      updated: result.updated,
      duplicatesSkipped: result.duplicatesSkipped,
      chunks: result.chunks.length,
      durationMs: Date.now() - startTime,
    });

    return result;
  }
}
