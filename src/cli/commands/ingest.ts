/**
 * Ingest command - load a JSON or NDJSON file into the store
 */

import { Command } from "commander";
import type { IngestCommandOptions } from "../config/types.js";
import { parseIntegerOption } from "../config/parser.js";
import { addStoreOptions, printResult, reportCommandError, resolveConfig } from "../shared.js";
import type { ConfigCliOptions } from "../../utils/config-loader.js";
import { readRecords } from "../../lib/source/json-reader.js";
import { createMongoRecordStore, type MongoRecordStore } from "../../lib/store/mongo-store.js";
import { BatchLoader } from "../../lib/loader/index.js";
import { LoadReporter } from "../../lib/reporter/index.js";
import { RecommendationEngine } from "../../lib/insights/index.js";
import { logger } from "../../utils/logger.js";

function pipelineOptions(options: IngestCommandOptions): Omit<ConfigCliOptions, "mongoUri" | "database"> {
  return {
    batchSize: options.batchSize,
    monitoredFields: options.monitoredFields,
    identifierFields: options.identifierFields,
    sampleCap: options.sampleCap,
    versionRetryLimit: options.versionRetryLimit,
  };
}

export function createIngestCommand(): Command {
  const command = new Command("ingest")
    .description("Infer, version, deduplicate and load records from a JSON or NDJSON file")
    .requiredOption("--input <path>", "Path to a .json (array) or .ndjson/.jsonl file")
    .option("--batch-size <n>", "Records per committed chunk", parseIntegerOption)
    .option("--monitored-fields <fields>", "Comma-separated fields whose changes are tracked")
    .option("--identifier-fields <fields>", "Comma-separated identity fields, highest priority first")
    .option("--sample-cap <n>", "Sample values kept per schema field", parseIntegerOption)
    .option("--version-retry-limit <n>", "Retries after losing a schema version race", parseIntegerOption)
    .option("--report <path>", "Write a JSON run summary to this path");

  return addStoreOptions(command).action(async (options: IngestCommandOptions) => {
    let store: MongoRecordStore | undefined;
    try {
      const config = resolveConfig(options, pipelineOptions(options));
      const records = await readRecords(options.input);

      store = await createMongoRecordStore(config.store);
      const loader = new BatchLoader(store, config.pipeline);
      const result = await loader.process(records);

      const reporter = new LoadReporter();
      await reporter.setInput(options.input);
      const summary = reporter.summarize(result);
      if (options.report) {
        await reporter.save(summary, options.report);
      }
      const recommendations = await new RecommendationEngine(store).generate(result.schema, {
        totalRecords: result.totalRecords,
        duplicatesSkipped: result.duplicatesSkipped,
      });

      printResult({
        status: "success",
        phase: "ingest",
        summary,
        schema: result.schema,
        chunks: result.chunks,
        changes: result.changes,
        recommendations,
      });
    } catch (error) {
      reportCommandError(error, "ingest");
    } finally {
      if (store) {
        await store.close();
      }
      logger.debug("Ingest command finished");
    }
  });
}
