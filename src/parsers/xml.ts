/**
 * XML (RSS) feed parser
 *
 * Walks every <item> element of a GDACS RSS document. Namespace prefixes are
 * dropped, so `gdacs:eventid` is read as `eventid` and `georss:point` as
 * `point`.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

import { ParseError } from "../services/sync/errors.js";
import {
  composeSourceId,
  normalizeEventType,
  normalizeSeverity,
  parseGeorssPositions,
  parseTimestamp,
  stripNul,
  textOf,
} from "./fields.js";

import type {
  EventGeometry,
  FeedEvent,
  ParseResult,
  ParseWarning,
  RawAttributes,
} from "../types/index.js";

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";

// Tags consumed into modeled fields
const MAPPED_TAGS = new Set([
  "source_id",
  "alertlevel",
  "fromdate",
  "point",
  "polygon",
  "Point",
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === "item",
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text content of an element, whether it was parsed as a bare string or as
 * an object carrying attributes
 */
function elementText(value: unknown): string | null {
  if (isNode(value)) {
    return textOf(value[TEXT_NODE]);
  }
  return textOf(value);
}

function collectItems(node: unknown, items: unknown[]): void {
  if (Array.isArray(node)) {
    for (const child of node) {
      collectItems(child, items);
    }
    return;
  }
  if (!isNode(node)) {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === "item") {
      items.push(...(Array.isArray(value) ? value : [value]));
    } else if (!key.startsWith(ATTRIBUTE_PREFIX)) {
      collectItems(value, items);
    }
  }
}

function decodeDocument(raw: string): XmlNode {
  if (raw.trim() === "") {
    throw new ParseError("xml", "empty payload");
  }

  const validation = XMLValidator.validate(raw);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(
      "xml",
      `payload is not well-formed XML: ${msg} (line ${String(line)}, column ${String(col)})`
    );
  }

  const document: unknown = parser.parse(raw);
  if (!isNode(document) || Object.keys(document).length === 0) {
    throw new ParseError("xml", "payload has no root element");
  }
  return document;
}

function readGeometry(
  item: XmlNode
): { geometry: EventGeometry | null } | { reason: string } {
  const pointText = elementText(item.point);
  if (pointText !== null) {
    const positions = parseGeorssPositions(pointText);
    const position = positions?.[0];
    if (positions?.length !== 1 || position === undefined) {
      return { reason: `unparseable georss point "${pointText}"` };
    }
    return { geometry: { type: "Point", coordinates: position } };
  }

  const polygonText = elementText(item.polygon);
  if (polygonText !== null) {
    const positions = parseGeorssPositions(polygonText);
    if (positions === null) {
      return { reason: "unparseable georss polygon" };
    }
    return { geometry: { type: "Polygon", coordinates: [positions] } };
  }

  if (isNode(item.Point)) {
    const lat = Number(elementText(item.Point.lat));
    const lon = Number(elementText(item.Point.long));
    if (
      elementText(item.Point.lat) === null ||
      elementText(item.Point.long) === null ||
      !Number.isFinite(lat) ||
      !Number.isFinite(lon)
    ) {
      return { reason: "unparseable geo:Point" };
    }
    return { geometry: { type: "Point", coordinates: [lon, lat] } };
  }

  return { geometry: null };
}

function collectRawAttributes(item: XmlNode): RawAttributes {
  const rawAttributes: RawAttributes = {};

  for (const [tag, value] of Object.entries(item)) {
    if (MAPPED_TAGS.has(tag) || tag.startsWith(ATTRIBUTE_PREFIX)) {
      continue;
    }
    if (typeof value === "string") {
      rawAttributes[tag] = stripNul(value);
      continue;
    }
    if (!isNode(value)) {
      continue;
    }
    const text = textOf(value[TEXT_NODE]);
    if (text !== null) {
      rawAttributes[tag] = text;
    }
    for (const [key, attribute] of Object.entries(value)) {
      if (key.startsWith(ATTRIBUTE_PREFIX) && typeof attribute === "string") {
        rawAttributes[`${tag}_${key.slice(ATTRIBUTE_PREFIX.length)}`] =
          stripNul(attribute);
      }
    }
  }

  return rawAttributes;
}

function parseItem(
  item: unknown,
  index: number,
  fetchedAt: Date
): FeedEvent | ParseWarning {
  if (!isNode(item)) {
    return { source: "xml", index, reason: "item has no child elements" };
  }

  const typeCode = elementText(item.eventtype);
  const sourceId =
    composeSourceId(
      elementText(item.source_id),
      typeCode,
      elementText(item.eventid)
    ) ?? elementText(item.guid);

  if (sourceId === null) {
    return { source: "xml", index, reason: "missing source identifier" };
  }

  const read = readGeometry(item);
  if ("reason" in read) {
    return { source: "xml", index, identifier: sourceId, reason: read.reason };
  }

  const rawAttributes = collectRawAttributes(item);
  // gdacs:severity usually carries a magnitude text; it only counts when it
  // names an alert level
  const alertLevel = elementText(item.alertlevel);
  const severity =
    normalizeSeverity(alertLevel) ??
    normalizeSeverity(elementText(item.severity));
  if (normalizeSeverity(alertLevel) === null && alertLevel !== null) {
    rawAttributes.alertlevel = alertLevel;
  }

  return {
    sourceId,
    eventType: normalizeEventType(typeCode),
    severity,
    geometry: read.geometry,
    occurredAt: parseTimestamp(
      elementText(item.fromdate) ?? elementText(item.pubDate)
    ),
    rawAttributes,
    fetchedAt,
  };
}

/**
 * Parse an RSS/XML payload. A well-formed document without items is a valid
 * "no active events" result.
 */
export function parseXmlFeed(raw: string, fetchedAt: Date): ParseResult {
  const document = decodeDocument(raw);

  const items: unknown[] = [];
  collectItems(document, items);

  const events: FeedEvent[] = [];
  const warnings: ParseWarning[] = [];

  for (const [index, item] of items.entries()) {
    const result = parseItem(item, index, fetchedAt);
    if ("reason" in result) {
      warnings.push(result);
    } else {
      events.push(result);
    }
  }

  return { events, warnings };
}
