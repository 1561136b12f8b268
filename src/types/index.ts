// GDACS disaster event types
// Both upstream formats (RSS/XML and GeoJSON) are decoded into these shapes.

// =====================
// Geometry Types
// =====================

/**
 * [longitude, latitude] in WGS84, GeoJSON axis order
 */
export type Position = [number, number];

export interface PointGeometry {
  type: "Point";
  coordinates: Position;
}

export interface PolygonGeometry {
  type: "Polygon";
  coordinates: Position[][];
}

export type EventGeometry = PointGeometry | PolygonGeometry;

// =====================
// Event Types
// =====================

export type EventType =
  | "earthquake"
  | "flood"
  | "cyclone"
  | "volcano"
  | "drought"
  | "wildfire"
  | "tsunami"
  | "other";

/**
 * GDACS alert level, ordered green < orange < red
 */
export type Severity = "green" | "orange" | "red";

export type RawAttributeValue = string | number | boolean | null;

export type RawAttributes = Record<string, RawAttributeValue>;

export type FeedSource = "geojson" | "xml";

/**
 * Canonical event, one per sourceId after reconciliation
 */
export interface DisasterEvent {
  sourceId: string;
  eventType: EventType | null;
  severity: Severity | null;
  geometry: EventGeometry;
  occurredAt: Date | null;
  rawAttributes: RawAttributes;
  fetchedAt: Date;
}

/**
 * Parser output. XML items may omit the geometry and rely on the
 * GeoJSON record of the same event for it.
 */
export interface FeedEvent extends Omit<DisasterEvent, "geometry"> {
  geometry: EventGeometry | null;
}

// =====================
// Parse / Sync Results
// =====================

export interface ParseWarning {
  source: FeedSource;
  index: number;
  identifier?: string;
  reason: string;
}

export interface ParseResult {
  events: FeedEvent[];
  warnings: ParseWarning[];
}

export interface DroppedRecord {
  sourceId: string;
  reason: string;
}

export interface PlannedWrite {
  event: DisasterEvent;
  fingerprint: string;
}

export interface ChangeSet {
  toInsert: PlannedWrite[];
  toUpdate: PlannedWrite[];
  unchanged: PlannedWrite[];
}

export interface FailedRecord {
  sourceId: string;
  reason: string;
}

export interface SyncResult {
  insertedCount: number;
  updatedCount: number;
  failed: FailedRecord[];
}
