/**
 * Event Repository - persisted state of disaster events
 *
 * The pipeline only depends on the EventRepository interface; the PostGIS
 * implementation below is the production store.
 */

import { sql } from "kysely";

import { jsonb } from "../../db/connection.js";
import { EVENTS_TABLE, UPSERT_BATCH_SIZE } from "../../db/types.js";
import { dbLogger } from "../../logger.js";

import type { Database } from "../../db/types.js";
import type { PlannedWrite, RawAttributes } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface UpsertCounts {
  inserted: number;
  updated: number;
}

export interface StoredEvent {
  sourceId: string;
  eventType: string | null;
  severity: string | null;
  geometry: unknown;
  occurredAt: Date | null;
  rawAttributes: RawAttributes;
  fingerprint: string;
  fetchedAt: Date;
  createdAt: Date;
  updatedAt: Date;
  version: number;
}

export interface EventRepository {
  /**
   * sourceId → fingerprint for every stored event
   */
  loadFingerprints(): Promise<Map<string, string>>;

  /**
   * Insert or update all rows in one transaction. Either every row is
   * committed or none is.
   */
  upsertEvents(writes: PlannedWrite[]): Promise<UpsertCounts>;

  findBySourceId(sourceId: string): Promise<StoredEvent | null>;
}

// ============================================================================
// PostGIS Repository
// ============================================================================

export class PostgisEventRepository implements EventRepository {
  constructor(
    private db: Kysely<Database>,
    private batchSize = UPSERT_BATCH_SIZE
  ) {}

  async loadFingerprints(): Promise<Map<string, string>> {
    const rows = await this.db
      .selectFrom("disaster_events")
      .select(["source_id", "fingerprint"])
      .execute();

    return new Map(rows.map((row) => [row.source_id, row.fingerprint]));
  }

  async upsertEvents(writes: PlannedWrite[]): Promise<UpsertCounts> {
    if (writes.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const counts = await this.db.transaction().execute(async (trx) => {
      let inserted = 0;
      let updated = 0;

      for (let i = 0; i < writes.length; i += this.batchSize) {
        const batch = writes.slice(i, i + this.batchSize);

        const values = batch.map(
          ({ event, fingerprint }) => sql`(
            ${event.sourceId},
            ${event.eventType},
            ${event.severity},
            ST_SetSRID(ST_GeomFromGeoJSON(${JSON.stringify(event.geometry)}::text), 4326),
            ${event.occurredAt},
            ${jsonb(event.rawAttributes)},
            ${fingerprint},
            ${event.fetchedAt}
          )`
        );

        // An unchanged fingerprint leaves the row (and its version) untouched
        const result = await sql<{ source_id: string; xmax: string }>`
          INSERT INTO disaster_events (
            source_id,
            event_type,
            severity,
            geometry,
            occurred_at,
            raw_attributes,
            fingerprint,
            fetched_at
          ) VALUES ${sql.join(values, sql`, `)}
          ON CONFLICT (source_id) DO UPDATE SET
            event_type = EXCLUDED.event_type,
            severity = EXCLUDED.severity,
            geometry = EXCLUDED.geometry,
            occurred_at = EXCLUDED.occurred_at,
            raw_attributes = EXCLUDED.raw_attributes,
            fingerprint = EXCLUDED.fingerprint,
            fetched_at = EXCLUDED.fetched_at,
            updated_at = NOW(),
            version = disaster_events.version + 1
          WHERE disaster_events.fingerprint IS DISTINCT FROM EXCLUDED.fingerprint
          RETURNING source_id, xmax::text
        `.execute(trx);

        // xmax = 0 means INSERT, xmax > 0 means UPDATE
        for (const row of result.rows) {
          if (row.xmax === "0") {
            inserted++;
          } else {
            updated++;
          }
        }
      }

      return { inserted, updated };
    });

    dbLogger.debug(
      { table: EVENTS_TABLE, rows: writes.length, ...counts },
      "Upsert transaction committed"
    );
    return counts;
  }

  async findBySourceId(sourceId: string): Promise<StoredEvent | null> {
    const row = await this.db
      .selectFrom("disaster_events")
      .select([
        "source_id",
        "event_type",
        "severity",
        sql<string>`ST_AsGeoJSON(geometry)`.as("geometry_json"),
        "occurred_at",
        "raw_attributes",
        "fingerprint",
        "fetched_at",
        "created_at",
        "updated_at",
        "version",
      ])
      .where("source_id", "=", sourceId)
      .executeTakeFirst();

    if (!row) {
      return null;
    }

    return {
      sourceId: row.source_id,
      eventType: row.event_type,
      severity: row.severity,
      geometry: JSON.parse(row.geometry_json) as unknown,
      occurredAt: row.occurred_at,
      rawAttributes: row.raw_attributes,
      fingerprint: row.fingerprint,
      fetchedAt: row.fetched_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      version: row.version,
    };
  }
}
