/**
 * GeoJSON feed parser
 *
 * Decodes a GDACS FeatureCollection into FeedEvents. A malformed feature is
 * skipped with a warning; only document-level defects raise ParseError.
 */

import { ParseError } from "../services/sync/errors.js";
import {
  composeSourceId,
  isRawAttributeValue,
  normalizeEventType,
  normalizeSeverity,
  parseTimestamp,
  readGeojsonGeometry,
  stripNul,
  textOf,
} from "./fields.js";

import type {
  FeedEvent,
  ParseResult,
  ParseWarning,
  RawAttributes,
} from "../types/index.js";

// Properties consumed into modeled fields; everything else scalar is passthrough
const MAPPED_PROPERTIES = new Set([
  "source_id",
  "event_type",
  "severity",
  "alertlevel",
  "occurred_at",
  "fromdate",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeDocument(raw: string): Record<string, unknown> {
  if (raw.trim() === "") {
    throw new ParseError("geojson", "empty payload");
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ParseError("geojson", "payload is not valid JSON", {
      cause: error,
    });
  }

  if (!isRecord(document) || document.type !== "FeatureCollection") {
    throw new ParseError("geojson", "payload is not a FeatureCollection");
  }
  return document;
}

function parseFeature(
  feature: unknown,
  index: number,
  fetchedAt: Date
): FeedEvent | ParseWarning {
  if (!isRecord(feature)) {
    return { source: "geojson", index, reason: "feature is not an object" };
  }

  const properties = isRecord(feature.properties) ? feature.properties : {};
  const typeCode = textOf(properties.eventtype);
  const sourceId = composeSourceId(
    textOf(properties.source_id),
    typeCode,
    textOf(properties.eventid)
  );

  if (sourceId === null) {
    return { source: "geojson", index, reason: "missing source identifier" };
  }

  const read = readGeojsonGeometry(feature.geometry);
  if ("reason" in read) {
    return { source: "geojson", index, identifier: sourceId, reason: read.reason };
  }

  const rawAttributes: RawAttributes = {};
  for (const [key, value] of Object.entries(properties)) {
    if (!MAPPED_PROPERTIES.has(key) && isRawAttributeValue(value)) {
      rawAttributes[stripNul(key)] =
        typeof value === "string" ? stripNul(value) : value;
    }
  }

  // severity may carry free text such as a magnitude; it only counts when it
  // names an alert level, and unrecognized text stays under its own key
  const severityText = textOf(properties.severity);
  const alertLevel = textOf(properties.alertlevel);
  const severity =
    normalizeSeverity(severityText) ?? normalizeSeverity(alertLevel);
  if (normalizeSeverity(severityText) === null && severityText !== null) {
    rawAttributes.severity = severityText;
  }
  if (normalizeSeverity(alertLevel) === null && alertLevel !== null) {
    rawAttributes.alertlevel = alertLevel;
  }

  return {
    sourceId,
    eventType: normalizeEventType(textOf(properties.event_type) ?? typeCode),
    severity,
    geometry: read.geometry,
    occurredAt: parseTimestamp(
      textOf(properties.occurred_at) ?? textOf(properties.fromdate)
    ),
    rawAttributes,
    fetchedAt,
  };
}

/**
 * Parse a GeoJSON FeatureCollection payload
 */
export function parseGeojsonFeed(raw: string, fetchedAt: Date): ParseResult {
  const document = decodeDocument(raw);

  if (!Array.isArray(document.features)) {
    throw new ParseError("geojson", "FeatureCollection has no features array");
  }

  const events: FeedEvent[] = [];
  const warnings: ParseWarning[] = [];

  for (const [index, feature] of document.features.entries()) {
    const result = parseFeature(feature, index, fetchedAt);
    if ("reason" in result) {
      warnings.push(result);
    } else {
      events.push(result);
    }
  }

  return { events, warnings };
}
