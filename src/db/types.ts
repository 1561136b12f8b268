import type { Generated } from "kysely";

import type { RawAttributes } from "../types/index.js";

// ============================================================================
// Table Types (matching postgres-schema.sql)
// ============================================================================

export interface DisasterEventsTable {
  source_id: string;
  event_type: string | null;
  severity: string | null;
  geometry: string; // PostGIS geometry, EWKB hex when read back raw
  occurred_at: Date | null;
  raw_attributes: RawAttributes;
  fingerprint: string;
  fetched_at: Date;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
  version: Generated<number>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  disaster_events: DisasterEventsTable;
}

export const EVENTS_TABLE = "disaster_events";

// Rows per INSERT ... ON CONFLICT statement inside the sync transaction
export const UPSERT_BATCH_SIZE = 200;
