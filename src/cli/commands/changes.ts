/**
 * Changes command - recent changes, change patterns and large changes
 */

import { Command } from "commander";
import type { ChangesCommandOptions } from "../config/types.js";
import { parseNumberOption, parsePositiveIntegerOption } from "../config/parser.js";
import { addStoreOptions, printResult, reportCommandError, resolveConfig } from "../shared.js";
import { createMongoRecordStore, type MongoRecordStore } from "../../lib/store/mongo-store.js";
import { ChangeAnalyzer } from "../../lib/changes/index.js";

export function createChangesCommand(): Command {
  const command = new Command("changes")
    .description("Report recent changes to monitored fields")
    .option("--days <n>", "Window for recent and large changes, in days", parsePositiveIntegerOption, 7)
    .option("--pattern-days <n>", "Window for pattern analysis, in days", parsePositiveIntegerOption, 30)
    .option("--limit <n>", "Maximum recent changes listed", parsePositiveIntegerOption, 100)
    .option("--threshold <percent>", "Relative change that counts as large", parseNumberOption, 50);

  return addStoreOptions(command).action(async (options: ChangesCommandOptions) => {
    let store: MongoRecordStore | undefined;
    try {
      const config = resolveConfig(options);
      store = await createMongoRecordStore(config.store);
      const analyzer = new ChangeAnalyzer(store);

      const recent = await analyzer.recentChanges(options.days, options.limit);
      const patterns = await analyzer.analyzePatterns(options.patternDays);
      const large = await analyzer.findLargeChanges(options.threshold, options.days);

      printResult({
        status: "success",
        phase: "changes",
        recent,
        patterns,
        largeChanges: large,
      });
    } catch (error) {
      reportCommandError(error, "changes");
    } finally {
      if (store) {
        await store.close();
      }
    }
  });
}
