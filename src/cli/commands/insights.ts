/**
 * Insights command - summary statistics, trends, distributions and recommendations
 */

import { Command } from "commander";
import type { InsightsCommandOptions } from "../config/types.js";
import { parsePositiveIntegerOption } from "../config/parser.js";
import { addStoreOptions, printResult, reportCommandError, resolveConfig } from "../shared.js";
import { createMongoRecordStore, type MongoRecordStore } from "../../lib/store/mongo-store.js";
import { SchemaVersionStore } from "../../lib/versioning/index.js";
import {
  DataInsights,
  RecommendationEngine,
  TrendAnalyzer,
  type FieldDistribution,
} from "../../lib/insights/index.js";
import type { SchemaVersion } from "../../types/data-model.js";
import { SchemaVersionError } from "../../utils/errors.js";

function pickVersion(versions: SchemaVersion[], wanted: number | undefined): SchemaVersion | undefined {
  if (wanted === undefined) {
    return versions[versions.length - 1];
  }
  const found = versions.find((version) => version.version === wanted);
  if (!found) {
    throw new SchemaVersionError(`Schema version ${wanted} does not exist`, { version: wanted });
  }
  return found;
}

export function createInsightsCommand(): Command {
  const command = new Command("insights")
    .description("Summarize stored records against a schema version")
    .option("--schema-version <n>", "Schema version to analyze (default: latest)", parsePositiveIntegerOption)
    .option("--days <n>", "Trend window, in days", parsePositiveIntegerOption, 30)
    .option("--fields <fields>", "Comma-separated fields to list value distributions for")
    .option("--limit <n>", "Values listed per distribution", parsePositiveIntegerOption, 20);

  return addStoreOptions(command).action(async (options: InsightsCommandOptions) => {
    let store: MongoRecordStore | undefined;
    try {
      const config = resolveConfig(options);
      store = await createMongoRecordStore(config.store);
      const versions = await new SchemaVersionStore(store, {
        retryLimit: config.pipeline.versionRetryLimit,
      }).list();
      const version = pickVersion(versions, options.schemaVersion);
      const schema = version?.schema ?? {};

      const insights = new DataInsights(store);
      const summary = await insights.summaryStatistics(schema);
      const trends = await new TrendAnalyzer(store).allTrends(schema, options.days);

      const distributions: FieldDistribution[] = [];
      for (const field of (options.fields ?? "").split(",")) {
        const name = field.trim();
        if (name.length > 0) {
          distributions.push(await insights.fieldDistribution(name, options.limit));
        }
      }

      const recommendations = await new RecommendationEngine(store, {
        trendDays: options.days,
      }).generate(schema);

      printResult({
        status: "success",
        phase: "insights",
        schemaVersion: version?.version ?? 0,
        summary,
        trends,
        distributions,
        recommendations,
      });
    } catch (error) {
      reportCommandError(error, "insights");
    } finally {
      if (store) {
        await store.close();
      }
    }
  });
}
