import { describe, it, expect } from "vitest";

import {
  composeSourceId,
  normalizeEventType,
  normalizeSeverity,
  parseGeorssPositions,
  parseTimestamp,
  readGeojsonGeometry,
  textOf,
} from "../../../src/parsers/fields.js";

describe("parsers/fields", () => {
  describe("normalizeEventType", () => {
    it("should map GDACS type codes case-insensitively", () => {
      expect(normalizeEventType("EQ")).toBe("earthquake");
      expect(normalizeEventType("tc")).toBe("cyclone");
      expect(normalizeEventType("WF")).toBe("wildfire");
    });

    it("should accept type names", () => {
      expect(normalizeEventType("Flood")).toBe("flood");
      expect(normalizeEventType("volcano")).toBe("volcano");
    });

    it("should map unknown values to other", () => {
      expect(normalizeEventType("XX")).toBe("other");
    });

    it("should keep null as null", () => {
      expect(normalizeEventType(null)).toBeNull();
    });
  });

  describe("normalizeSeverity", () => {
    it("should lower-case known alert levels", () => {
      expect(normalizeSeverity("Orange")).toBe("orange");
      expect(normalizeSeverity("RED")).toBe("red");
      expect(normalizeSeverity("green")).toBe("green");
    });

    it("should return null for anything else", () => {
      expect(normalizeSeverity("Magnitude 6.1M")).toBeNull();
      expect(normalizeSeverity(null)).toBeNull();
    });
  });

  describe("textOf", () => {
    it("should trim strings and drop blank ones", () => {
      expect(textOf("  EQ  ")).toBe("EQ");
      expect(textOf("   ")).toBeNull();
    });

    it("should remove NUL characters", () => {
      expect(textOf(" TC\u000042 ")).toBe("TC42");
      expect(textOf("\u0000")).toBeNull();
    });

    it("should stringify finite numbers only", () => {
      expect(textOf(1001)).toBe("1001");
      expect(textOf(Number.NaN)).toBeNull();
    });

    it("should reject non-scalars", () => {
      expect(textOf({ value: "x" })).toBeNull();
      expect(textOf(undefined)).toBeNull();
    });
  });

  describe("parseTimestamp", () => {
    it("should parse RFC 1123 dates", () => {
      expect(parseTimestamp("Tue, 30 Apr 2024 08:15:00 GMT")?.toISOString()).toBe(
        "2024-04-30T08:15:00.000Z"
      );
    });

    it("should read zoneless ISO timestamps as UTC", () => {
      expect(parseTimestamp("2024-04-30T08:15:00")?.toISOString()).toBe(
        "2024-04-30T08:15:00.000Z"
      );
    });

    it("should keep an explicit offset", () => {
      expect(parseTimestamp("2024-04-30T10:15:00+02:00")?.toISOString()).toBe(
        "2024-04-30T08:15:00.000Z"
      );
    });

    it("should return null for unparseable or missing values", () => {
      expect(parseTimestamp("not a date")).toBeNull();
      expect(parseTimestamp(null)).toBeNull();
    });
  });

  describe("composeSourceId", () => {
    it("should prefer the explicit identifier", () => {
      expect(composeSourceId("EQ001", "FL", "5")).toBe("EQ001");
    });

    it("should join type code and event id", () => {
      expect(composeSourceId(null, "eq", "1001")).toBe("EQ1001");
    });

    it("should return null when the parts are incomplete", () => {
      expect(composeSourceId(null, "EQ", null)).toBeNull();
      expect(composeSourceId(null, null, "1001")).toBeNull();
    });
  });

  describe("readGeojsonGeometry", () => {
    it("should read a point and drop a third coordinate", () => {
      expect(readGeojsonGeometry({ type: "Point", coordinates: [10, 20, 5] })).toEqual({
        geometry: { type: "Point", coordinates: [10, 20] },
      });
    });

    it("should read a polygon", () => {
      const ring = [
        [0, 0],
        [1, 0],
        [1, 1],
        [0, 0],
      ];
      expect(readGeojsonGeometry({ type: "Polygon", coordinates: [ring] })).toEqual({
        geometry: { type: "Polygon", coordinates: [ring] },
      });
    });

    it("should report the reason a geometry is unusable", () => {
      expect(readGeojsonGeometry(null)).toEqual({ reason: "missing geometry" });
      expect(readGeojsonGeometry({ type: "Point", coordinates: ["a", 2] })).toEqual({
        reason: "point coordinates are not a numeric pair",
      });
      expect(readGeojsonGeometry({ type: "Polygon", coordinates: [] })).toEqual({
        reason: "polygon has no rings",
      });
      expect(
        readGeojsonGeometry({ type: "Polygon", coordinates: [[[0, 0], [1, "x"]]] })
      ).toEqual({ reason: "polygon ring has non-numeric positions" });
      expect(readGeojsonGeometry({ type: "LineString", coordinates: [] })).toEqual({
        reason: "unsupported geometry type LineString",
      });
    });
  });

  describe("parseGeorssPositions", () => {
    it("should swap latitude-first pairs into [lon, lat]", () => {
      expect(parseGeorssPositions("20 10")).toEqual([[10, 20]]);
      expect(parseGeorssPositions(" -15.25   130.5 ")).toEqual([[130.5, -15.25]]);
    });

    it("should read a ring", () => {
      expect(parseGeorssPositions("0 0 0 1 1 1 0 0")).toEqual([
        [0, 0],
        [1, 0],
        [1, 1],
        [0, 0],
      ]);
    });

    it("should reject odd counts and non-numbers", () => {
      expect(parseGeorssPositions("1 2 3")).toBeNull();
      expect(parseGeorssPositions("91.0")).toBeNull();
      expect(parseGeorssPositions("north east")).toBeNull();
    });
  });
});
