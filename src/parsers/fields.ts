/**
 * Field normalization shared by the GeoJSON and XML parsers
 */

import type {
  EventGeometry,
  EventType,
  Position,
  RawAttributeValue,
  Severity,
} from "../types/index.js";

// ============================================================================
// Event Type / Severity
// ============================================================================

const EVENT_TYPE_CODES: Record<string, EventType> = {
  EQ: "earthquake",
  FL: "flood",
  TC: "cyclone",
  VO: "volcano",
  DR: "drought",
  WF: "wildfire",
  TS: "tsunami",
};

const EVENT_TYPE_NAMES: Record<string, EventType> = Object.fromEntries(
  Object.values(EVENT_TYPE_CODES).map((name) => [name, name])
);

/**
 * Map a GDACS type code ("EQ") or a type name ("earthquake") to an EventType.
 * Unrecognized non-empty values map to "other".
 */
export function normalizeEventType(value: string | null): EventType | null {
  if (value === null) {
    return null;
  }
  const fromCode = EVENT_TYPE_CODES[value.toUpperCase()];
  if (fromCode !== undefined) {
    return fromCode;
  }
  return EVENT_TYPE_NAMES[value.toLowerCase()] ?? "other";
}

export function normalizeSeverity(value: string | null): Severity | null {
  switch (value?.toLowerCase()) {
    case "green":
      return "green";
    case "orange":
      return "orange";
    case "red":
      return "red";
    default:
      return null;
  }
}

// ============================================================================
// Scalars
// ============================================================================

/**
 * PostgreSQL rejects U+0000 in TEXT and JSONB values
 */
export function stripNul(value: string): string {
  return value.replaceAll("\u0000", "");
}

/**
 * Trimmed string form of a scalar, or null for missing/blank/non-scalar values
 */
export function textOf(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = stripNul(value).trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function isRawAttributeValue(
  value: unknown
): value is RawAttributeValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

// ISO-8601 date-time without an offset
const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse an upstream timestamp. GDACS uses ISO-8601 in GeoJSON and
 * RFC 1123 dates in RSS; zoneless ISO values are UTC.
 */
export function parseTimestamp(value: string | null): Date | null {
  if (value === null) {
    return null;
  }
  const date = new Date(ZONELESS_ISO.test(value) ? `${value}Z` : value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Compose the upstream identifier: explicit id first, then type code + event id
 */
export function composeSourceId(
  explicitId: string | null,
  typeCode: string | null,
  eventId: string | null
): string | null {
  if (explicitId !== null) {
    return explicitId;
  }
  if (typeCode !== null && eventId !== null) {
    return `${typeCode.toUpperCase()}${eventId}`;
  }
  return null;
}

// ============================================================================
// Geometry
// ============================================================================

function toPosition(value: unknown): Position | null {
  if (!Array.isArray(value) || value.length < 2) {
    return null;
  }
  const [lon, lat] = value;
  if (
    typeof lon !== "number" ||
    typeof lat !== "number" ||
    !Number.isFinite(lon) ||
    !Number.isFinite(lat)
  ) {
    return null;
  }
  return [lon, lat];
}

function toRing(value: unknown): Position[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const ring: Position[] = [];
  for (const item of value) {
    const position = toPosition(item);
    if (position === null) {
      return null;
    }
    ring.push(position);
  }
  return ring;
}

/**
 * Structural read of a GeoJSON geometry object. Returns a reason string when
 * the shape is unusable; semantic checks (bounds, degeneracy) happen before
 * persistence.
 */
export function readGeojsonGeometry(
  value: unknown
): { geometry: EventGeometry } | { reason: string } {
  if (typeof value !== "object" || value === null) {
    return { reason: "missing geometry" };
  }
  const type = "type" in value ? value.type : undefined;
  const coordinates = "coordinates" in value ? value.coordinates : undefined;

  if (type === "Point") {
    const position = toPosition(coordinates);
    return position === null
      ? { reason: "point coordinates are not a numeric pair" }
      : { geometry: { type: "Point", coordinates: position } };
  }

  if (type === "Polygon") {
    if (!Array.isArray(coordinates) || coordinates.length === 0) {
      return { reason: "polygon has no rings" };
    }
    const rings: Position[][] = [];
    for (const item of coordinates) {
      const ring = toRing(item);
      if (ring === null) {
        return { reason: "polygon ring has non-numeric positions" };
      }
      rings.push(ring);
    }
    return { geometry: { type: "Polygon", coordinates: rings } };
  }

  return { reason: `unsupported geometry type ${String(type)}` };
}

/**
 * Parse a GeoRSS coordinate list ("lat lon lat lon ..."), which uses
 * latitude-first order.
 */
export function parseGeorssPositions(text: string): Position[] | null {
  const parts = text.trim().split(/[\s,]+/);
  if (parts.length < 2 || parts.length % 2 !== 0) {
    return null;
  }
  const positions: Position[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    const lat = Number(parts[i]);
    const lon = Number(parts[i + 1]);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      return null;
    }
    positions.push([lon, lat]);
  }
  return positions;
}
