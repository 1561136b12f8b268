import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { dbLogger } from "../logger.js";
import { closeConnection, getDatabase } from "./connection.js";

import { EVENTS_TABLE } from "./types.js";

const currentFilePath = fileURLToPath(import.meta.url);
const currentDirPath = dirname(currentFilePath);

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Run the PostgreSQL schema migration from postgres-schema.sql
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  const client = await getDatabase().pool.connect();

  try {
    // Read the schema file
    const schemaPath = join(currentDirPath, "postgres-schema.sql");
    const schema = readFileSync(schemaPath, "utf8");

    await client.query("BEGIN");

    if (options?.fresh === true) {
      dbLogger.info(`Dropping ${EVENTS_TABLE} (--fresh mode)...`);
      await client.query(`DROP TABLE IF EXISTS ${EVENTS_TABLE} CASCADE`);
    }

    dbLogger.info("Running PostgreSQL schema migration...");
    await client.query(schema);
    await client.query("COMMIT");

    dbLogger.info("Schema migration completed successfully");
  } catch (error) {
    await client.query("ROLLBACK");
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Check if the events table exists
 */
export async function hasSchema(): Promise<boolean> {
  const client = await getDatabase().pool.connect();
  try {
    const result = await client.query<{ count: number }>(
      `
      SELECT COUNT(*)::int as count
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name = $1
    `,
      [EVENTS_TABLE]
    );
    const row = result.rows[0];
    return row !== undefined && row.count > 0;
  } finally {
    client.release();
  }
}

export interface EventTableStats {
  total: number;
  byType: { event_type: string | null; count: number }[];
  lastFetchedAt: Date | null;
}

/**
 * Row counts for the status command
 */
export async function getEventTableStats(): Promise<EventTableStats> {
  const client = await getDatabase().pool.connect();
  try {
    const totals = await client.query<{ total: number; last_fetched_at: Date | null }>(
      `SELECT COUNT(*)::int AS total, MAX(fetched_at) AS last_fetched_at FROM ${EVENTS_TABLE}`
    );
    const byType = await client.query<{ event_type: string | null; count: number }>(
      `
      SELECT event_type, COUNT(*)::int AS count
      FROM ${EVENTS_TABLE}
      GROUP BY event_type
      ORDER BY count DESC
    `
    );
    const row = totals.rows[0];
    return {
      total: row?.total ?? 0,
      byType: byType.rows,
      lastFetchedAt: row?.last_fetched_at ?? null,
    };
  } finally {
    client.release();
  }
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const fresh = args.includes("--fresh");

  if (fresh) {
    console.log(`Running migration with --fresh flag (will drop ${EVENTS_TABLE})`);
  }

  try {
    await runMigration({ fresh });
    console.log("Migration completed successfully!");

    const stats = await getEventTableStats();
    console.log(`\n${EVENTS_TABLE}: ${String(stats.total)} rows`);
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// Only run main() if this file is executed directly (not imported)
const isMainModule = process.argv[1]?.includes("migrate");
if (isMainModule) {
  void main();
}
