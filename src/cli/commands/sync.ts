import ora from "ora";

import { loadConfig } from "../../config.js";
import { closeConnection, getDatabase } from "../../db/connection.js";
import { errorCode, errorMessage } from "../../services/sync/errors.js";
import { createSyncServices } from "../../services/sync/index.js";
import { displayCycleReport } from "../utils/display.js";

import type { CycleStage } from "../../services/sync/pipeline.js";
import type { Command } from "commander";

const STAGE_LABELS: Record<CycleStage, string> = {
  FETCHING: "Fetching GeoJSON and XML feeds...",
  PARSING: "Parsing feeds...",
  RECONCILING: "Reconciling events...",
  DIFFING: "Comparing with stored events...",
  WRITING: "Writing changes...",
};

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Run the GDACS event sync by hand");

  // sync once
  sync
    .command("once")
    .description("Run a single fetch → parse → reconcile → write cycle")
    .action(async () => {
      const spinner = ora("Starting sync cycle...").start();
      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Cancelling at next checkpoint...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        const config = loadConfig();
        const { pipeline } = createSyncServices(config, getDatabase(config).db);

        const report = await pipeline.runCycle({
          signal: controller.signal,
          onStage: (stage) => {
            spinner.text = STAGE_LABELS[stage];
          },
        });

        spinner.succeed(
          `Sync complete: ${String(report.insertedCount)} inserted, ${String(report.updatedCount)} updated, ${String(report.unchangedCount)} unchanged`
        );
        displayCycleReport(report);
      } catch (error) {
        spinner.fail(`Sync failed [${errorCode(error)}]: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await closeConnection();
      }
    });
}
