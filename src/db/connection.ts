import { Kysely, PostgresDialect, sql, type RawBuilder } from "kysely";
import pg from "pg";

import { loadConfig, maskDatabaseUrl, type AppConfig } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Configure pg to parse JSON/JSONB as objects instead of strings
types.setTypeParser(
  types.builtins.JSON,
  (val: string) => JSON.parse(val) as unknown
);
types.setTypeParser(
  types.builtins.JSONB,
  (val: string) => JSON.parse(val) as unknown
);

/**
 * Helper to convert JavaScript objects to JSONB SQL expressions for Kysely inserts/updates.
 * Kysely doesn't serialize objects to JSON for PostgreSQL on its own.
 */
export function jsonb<T>(value: T): RawBuilder<T> {
  return sql<T>`${JSON.stringify(value)}::jsonb`;
}

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

interface DatabaseHandle {
  pool: pg.Pool;
  db: Kysely<Database>;
  databaseUrl: string;
}

let handle: DatabaseHandle | undefined;

function createHandle(config: AppConfig): DatabaseHandle {
  const poolConfig: pg.PoolConfig = {
    connectionString: config.databaseUrl,
    max: 5, // One sync cycle at a time; a few extra for the ops server
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
    statement_timeout: config.dbStatementTimeoutMs,
  };

  const pool = new Pool(poolConfig);

  // An idle client losing its connection must not crash the long-running process
  pool.on("error", (error) => {
    dbLogger.error({ error }, "Idle database client error");
  });

  return {
    pool,
    db: new Kysely<Database>({ dialect: new PostgresDialect({ pool }) }),
    databaseUrl: config.databaseUrl,
  };
}

/**
 * Shared pool and Kysely instance, created on first use
 */
export function getDatabase(config?: AppConfig): DatabaseHandle {
  handle ??= createHandle(config ?? loadConfig());
  return handle;
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(): Promise<boolean> {
  const { pool } = getDatabase();
  try {
    const client = await pool.connect();
    try {
      await client.query("SELECT 1");
      return true;
    } finally {
      client.release();
    }
  } catch (error) {
    dbLogger.warn({ error }, "Database connection check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(): Promise<void> {
  if (handle === undefined) {
    return;
  }
  try {
    // db.destroy() also ends the pool
    await handle.db.destroy();
    handle = undefined;
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(): string {
  return maskDatabaseUrl(getDatabase().databaseUrl);
}

/**
 * Get pool statistics
 */
export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  const { pool } = getDatabase();
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
