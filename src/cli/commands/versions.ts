/**
 * Versions command - list stored schema versions
 */

import { Command } from "commander";
import type { VersionsCommandOptions } from "../config/types.js";
import { addStoreOptions, printResult, reportCommandError, resolveConfig } from "../shared.js";
import { createMongoRecordStore, type MongoRecordStore } from "../../lib/store/mongo-store.js";
import { SchemaVersionStore } from "../../lib/versioning/index.js";

export function createVersionsCommand(): Command {
  const command = new Command("versions").description("List stored schema versions");

  return addStoreOptions(command).action(async (options: VersionsCommandOptions) => {
    let store: MongoRecordStore | undefined;
    try {
      const config = resolveConfig(options);
      store = await createMongoRecordStore(config.store);
      const versions = await new SchemaVersionStore(store, {
        retryLimit: config.pipeline.versionRetryLimit,
      }).list();

      printResult({
        status: "success",
        phase: "versions",
        count: versions.length,
        versions,
      });
    } catch (error) {
      reportCommandError(error, "versions");
    } finally {
      if (store) {
        await store.close();
      }
    }
  });
}
