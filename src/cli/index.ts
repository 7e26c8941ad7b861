#!/usr/bin/env node

/**
 * RecordLoom CLI - schema-versioned, deduplicating record loader
 */

import { Command } from "commander";
import { createIngestCommand } from "./commands/ingest.js";
import { createVersionsCommand } from "./commands/versions.js";
import { createChangesCommand } from "./commands/changes.js";
import { createInsightsCommand } from "./commands/insights.js";
import { isLogLevel, logger } from "../utils/logger.js";
import { reportCommandError } from "./shared.js";

const pkg = {
  name: "recordloom",
  version: "0.1.0",
  description: "Load loosely-typed records with schema versioning, deduplication and change tracking",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  program.hook("preAction", (thisCommand) => {
    const level: unknown = thisCommand.opts().logLevel;
    if (isLogLevel(level)) {
      logger.setLevel(level);
    }
  });

  program.addCommand(createIngestCommand());
  program.addCommand(createVersionsCommand());
  program.addCommand(createChangesCommand());
  program.addCommand(createInsightsCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error);
  reportCommandError(error, "cli");
});
