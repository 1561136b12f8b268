import ora from "ora";

import { loadConfig, maskDatabaseUrl, type AppConfig } from "../../config.js";
import { checkConnection, closeConnection, getDatabase } from "../../db/connection.js";
import { logger, syncLogger } from "../../logger.js";
import { startServer } from "../../server/index.js";
import { errorMessage } from "../../services/sync/errors.js";
import { createSyncServices } from "../../services/sync/index.js";

import type { Command } from "commander";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Run Command
// ============================================================================

async function ensureStore(config: AppConfig): Promise<boolean> {
  const spinner = ora("Checking database connection...").start();
  getDatabase(config);
  const connected = await checkConnection();

  if (connected) {
    spinner.succeed("Database connected");
    return true;
  }

  const target = maskDatabaseUrl(config.databaseUrl);
  if (config.failFast) {
    spinner.fail(`Database unreachable at ${target}`);
    return false;
  }

  spinner.warn(`Database unreachable at ${target}; cycles will retry`);
  return true;
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Run the sync loop until SIGINT/SIGTERM")
    .option("--serve", "Also start the operations HTTP server")
    .action(async (options: { serve?: boolean }) => {
      let config: AppConfig;
      try {
        config = loadConfig();
      } catch (error) {
        console.error(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      let server: FastifyInstance | undefined;

      try {
        if (!(await ensureStore(config))) {
          process.exitCode = 1;
          return;
        }

        const { repository, scheduler } = createSyncServices(
          config,
          getDatabase(config).db
        );

        if (options.serve === true) {
          server = await startServer(
            { scheduler, repository },
            { host: config.host, port: config.port }
          );
        }

        const shutdown = (signal: NodeJS.Signals): void => {
          syncLogger.info({ signal }, "Shutdown signal received");
          scheduler.stop();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);

        await scheduler.run();
      } catch (error) {
        logger.fatal({ error }, "Sync process failed to start");
        process.exitCode = 1;
      } finally {
        await server?.close();
        await closeConnection();
      }
    });
}
