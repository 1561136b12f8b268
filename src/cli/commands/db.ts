import chalk from "chalk";
import ora from "ora";

import {
  checkConnection,
  closeConnection,
  getDatabaseUrl,
  getPoolStats,
} from "../../db/connection.js";
import { runMigration, hasSchema, getEventTableStats } from "../../db/migrate.js";
import { EVENTS_TABLE } from "../../db/types.js";
import { errorMessage } from "../../services/sync/errors.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Run database migration from postgres-schema.sql")
    .option("--fresh", `Drop ${EVENTS_TABLE} first (destructive!)`)
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        if (options.fresh === true) {
          spinner.text = `Dropping ${EVENTS_TABLE}...`;
        }

        await runMigration({ fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        const stats = await getEventTableStats();
        console.log(`\n  ${EVENTS_TABLE}: ${String(stats.total)} rows`);
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const connected = await checkConnection();

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${getDatabaseUrl()}`);

        // Pool stats
        const poolStats = getPoolStats();
        console.log("\nPool statistics:");
        console.log(`  Total connections: ${String(poolStats.totalCount)}`);
        console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
        console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);

        const schemaExists = await hasSchema();
        if (!schemaExists) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
          return;
        }

        const stats = await getEventTableStats();
        console.log(`\nEvents: ${String(stats.total)}`);
        for (const row of stats.byType) {
          console.log(`  ${(row.event_type ?? "unknown").padEnd(12)} ${String(row.count)}`);
        }
        console.log(
          `Last fetched: ${stats.lastFetchedAt?.toISOString() ?? chalk.gray("never")}`
        );
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db reset
  db.command("reset")
    .description(`Reset database (drop and recreate ${EVENTS_TABLE})`)
    .action(async () => {
      const spinner = ora("Resetting database...").start();

      try {
        await runMigration({ fresh: true });
        spinner.succeed("Database reset completed");
      } catch (error) {
        spinner.fail(`Reset failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
