import { describe, it, expect } from "vitest";

import { parseXmlFeed } from "../../../src/parsers/xml.js";
import { ParseError } from "../../../src/services/sync/errors.js";
import { FETCHED_AT, rssFeed, rssItem, sampleRss } from "../../fixtures/feeds.js";

describe("parsers/xml", () => {
  describe("parseXmlFeed", () => {
    it("should decode every item of an RSS document", () => {
      const result = parseXmlFeed(sampleRss, FETCHED_AT);

      expect(result.warnings).toEqual([]);
      expect(result.events).toEqual([
        {
          sourceId: "EQ1001",
          eventType: "earthquake",
          severity: "green",
          geometry: { type: "Point", coordinates: [12.5, 41.9] },
          occurredAt: new Date("2024-04-30T08:15:00.000Z"),
          rawAttributes: {
            title: "Green earthquake alert in Testland",
            eventtype: "EQ",
            eventid: "1001",
            episodeid: "1",
          },
          fetchedAt: FETCHED_AT,
        },
        {
          sourceId: "TC3003",
          eventType: "cyclone",
          severity: "red",
          geometry: { type: "Point", coordinates: [130.5, -15.25] },
          occurredAt: new Date("2024-04-29T06:00:00.000Z"),
          rawAttributes: {
            title: "Red cyclone alert",
            eventtype: "TC",
            eventid: "3003",
          },
          fetchedAt: FETCHED_AT,
        },
      ]);
    });

    it("should keep an item without a geometry tag with null geometry", () => {
      const result = parseXmlFeed(
        rssFeed([rssItem({ source_id: "EQ001", "gdacs:alertlevel": "Orange" })]),
        FETCHED_AT
      );

      expect(result.warnings).toEqual([]);
      expect(result.events[0]?.sourceId).toBe("EQ001");
      expect(result.events[0]?.severity).toBe("orange");
      expect(result.events[0]?.geometry).toBeNull();
    });

    it("should take severity from gdacs:severity when it names an alert level", () => {
      const result = parseXmlFeed(
        rssFeed([rssItem({ source_id: "EQ002", "gdacs:severity": "orange" })]),
        FETCHED_AT
      );

      expect(result.events[0]?.severity).toBe("orange");
      expect(result.events[0]?.rawAttributes).toEqual({ severity: "orange" });
    });

    it("should fall back to guid and flatten attributes", () => {
      const result = parseXmlFeed(
        rssFeed([
          '<item><guid isPermaLink="false">DR42</guid><georss:point>5 6</georss:point></item>',
        ]),
        FETCHED_AT
      );

      expect(result.events).toHaveLength(1);
      expect(result.events[0]?.sourceId).toBe("DR42");
      expect(result.events[0]?.geometry).toEqual({ type: "Point", coordinates: [6, 5] });
      expect(result.events[0]?.rawAttributes).toEqual({
        guid: "DR42",
        guid_isPermaLink: "false",
      });
    });

    it("should read geo:Point and georss:polygon", () => {
      const result = parseXmlFeed(
        rssFeed([
          '<item><source_id>VO1</source_id><geo:Point><geo:lat>20</geo:lat><geo:long>10</geo:long></geo:Point></item>',
          rssItem({ source_id: "FL2", "georss:polygon": "0 0 0 1 1 1 0 0" }),
        ]),
        FETCHED_AT
      );

      expect(result.events.map((event) => event.geometry)).toEqual([
        { type: "Point", coordinates: [10, 20] },
        {
          type: "Polygon",
          coordinates: [
            [
              [0, 0],
              [1, 0],
              [1, 1],
              [0, 0],
            ],
          ],
        },
      ]);
    });

    it("should skip unusable items with a warning each", () => {
      const result = parseXmlFeed(
        rssFeed([
          rssItem({ title: "no identifier" }),
          rssItem({ source_id: "EQ3", "georss:point": "91.0" }),
          "<item></item>",
          rssItem({ source_id: "EQ4", "georss:point": "1 2" }),
        ]),
        FETCHED_AT
      );

      expect(result.events.map((event) => event.sourceId)).toEqual(["EQ4"]);
      expect(result.warnings).toEqual([
        { source: "xml", index: 0, reason: "missing source identifier" },
        {
          source: "xml",
          index: 1,
          identifier: "EQ3",
          reason: 'unparseable georss point "91.0"',
        },
        { source: "xml", index: 2, reason: "item has no child elements" },
      ]);
    });

    it("should find items nested below any element", () => {
      const result = parseXmlFeed(
        "<feed><entries><item><source_id>TS1</source_id><georss:point>1 2</georss:point></item></entries></feed>",
        FETCHED_AT
      );

      expect(result.events.map((event) => event.sourceId)).toEqual(["TS1"]);
    });

    it("should treat a document without items as no active events", () => {
      expect(parseXmlFeed(rssFeed([]), FETCHED_AT)).toEqual({
        events: [],
        warnings: [],
      });
    });

    it("should throw ParseError for empty or malformed documents", () => {
      expect(() => parseXmlFeed("  ", FETCHED_AT)).toThrow("empty payload");
      expect(() =>
        parseXmlFeed("<rss><channel><item></channel></rss>", FETCHED_AT)
      ).toThrow(ParseError);
      expect(() =>
        parseXmlFeed("<rss><channel><item></channel></rss>", FETCHED_AT)
      ).toThrow(/^payload is not well-formed XML/);
    });
  });
});
