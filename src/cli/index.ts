#!/usr/bin/env node

/**
 * Disaster Feed Sync CLI
 *
 * Keeps a PostGIS table of GDACS disaster events in step with the GDACS
 * GeoJSON and RSS feeds.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerPreviewCommand } from "./commands/preview.js";
import { registerRunCommand } from "./commands/run.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("disaster-sync")
  .description("GDACS disaster event ingestion and PostGIS sync")
  .version("1.0.0");

// Register all commands
registerRunCommand(program);
registerSyncCommand(program);
registerPreviewCommand(program);
registerDbCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
