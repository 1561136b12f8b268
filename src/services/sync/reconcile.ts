/**
 * Event Reconciler
 *
 * Merges the GeoJSON and XML views of the feed into one canonical record per
 * sourceId. Precedence is a fixed policy:
 * - XML is the base record and wins every conflicting non-null scalar
 * - null/absent XML fields are filled from GeoJSON
 * - geometry always comes from GeoJSON when it has the event
 */

import { stableStringify } from "./fingerprint.js";

import type {
  DisasterEvent,
  DroppedRecord,
  FeedEvent,
  RawAttributes,
} from "../../types/index.js";

export interface ReconcileResult {
  events: DisasterEvent[];
  dropped: DroppedRecord[];
}

// ============================================================================
// Same-feed duplicates
// ============================================================================

function episodeOf(event: FeedEvent): number {
  const value = event.rawAttributes.episodeid;
  const episode =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value)
        : Number.NaN;
  return Number.isFinite(episode) ? episode : Number.NEGATIVE_INFINITY;
}

/**
 * Pick one of two records sharing a sourceId within a single feed: the latest
 * episode wins, ties go to the greater serialization so input order never
 * matters.
 */
function preferRecord(a: FeedEvent, b: FeedEvent): FeedEvent {
  const episodeA = episodeOf(a);
  const episodeB = episodeOf(b);
  if (episodeA !== episodeB) {
    return episodeA > episodeB ? a : b;
  }
  return stableStringify(a) >= stableStringify(b) ? a : b;
}

export function collapseDuplicates(events: FeedEvent[]): Map<string, FeedEvent> {
  const bySourceId = new Map<string, FeedEvent>();
  for (const event of events) {
    const existing = bySourceId.get(event.sourceId);
    bySourceId.set(
      event.sourceId,
      existing === undefined ? event : preferRecord(existing, event)
    );
  }
  return bySourceId;
}

// ============================================================================
// Cross-feed merge
// ============================================================================

function mergeAttributes(
  base: RawAttributes,
  fallback: RawAttributes
): RawAttributes {
  const merged: RawAttributes = { ...fallback };
  for (const [key, value] of Object.entries(base)) {
    if (value !== null || !(key in merged)) {
      merged[key] = value;
    }
  }
  return merged;
}

export function mergeRecords(xml: FeedEvent, geojson: FeedEvent): FeedEvent {
  return {
    sourceId: xml.sourceId,
    eventType: xml.eventType ?? geojson.eventType,
    severity: xml.severity ?? geojson.severity,
    geometry: geojson.geometry ?? xml.geometry,
    occurredAt: xml.occurredAt ?? geojson.occurredAt,
    rawAttributes: mergeAttributes(xml.rawAttributes, geojson.rawAttributes),
    fetchedAt: xml.fetchedAt,
  };
}

/**
 * Merge both feeds into canonical events, at most one per sourceId.
 * Records left without geometry are dropped and reported.
 */
export function reconcile(
  geojsonEvents: FeedEvent[],
  xmlEvents: FeedEvent[]
): ReconcileResult {
  const fromGeojson = collapseDuplicates(geojsonEvents);
  const fromXml = collapseDuplicates(xmlEvents);

  const sourceIds = [...new Set([...fromGeojson.keys(), ...fromXml.keys()])].sort();

  const events: DisasterEvent[] = [];
  const dropped: DroppedRecord[] = [];

  for (const sourceId of sourceIds) {
    const geojson = fromGeojson.get(sourceId);
    const xml = fromXml.get(sourceId);

    let record: FeedEvent;
    if (geojson !== undefined && xml !== undefined) {
      record = mergeRecords(xml, geojson);
    } else if (xml !== undefined) {
      record = xml;
    } else if (geojson !== undefined) {
      record = geojson;
    } else {
      continue;
    }

    const { geometry } = record;
    if (geometry === null) {
      dropped.push({ sourceId, reason: "no geometry in either feed" });
      continue;
    }
    events.push({ ...record, geometry });
  }

  return { events, dropped };
}
