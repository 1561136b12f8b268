import { describe, it, expect, vi } from "vitest";

import { PostgisEventRepository } from "../../../../src/services/sync/repository.js";
import { FETCHED_AT, disasterEvent } from "../../../fixtures/feeds.js";
import { createMockDb } from "../../../mocks/db.js";

import type { PlannedWrite } from "../../../../src/types/index.js";

// Mock the logger
vi.mock("../../../../src/logger.js", () => ({
  dbLogger: {
    debug: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
  },
}));

function planned(sourceId: string, fingerprint = `fp-${sourceId}`): PlannedWrite {
  return { event: disasterEvent({ sourceId }), fingerprint };
}

describe("services/sync/repository (PostGIS)", () => {
  describe("loadFingerprints", () => {
    it("should index stored fingerprints by source id", async () => {
      const mock = createMockDb(() => [
        { source_id: "EQ1", fingerprint: "aaa" },
        { source_id: "FL2", fingerprint: "bbb" },
      ]);

      const index = await new PostgisEventRepository(mock.db).loadFingerprints();

      expect(index).toEqual(
        new Map([
          ["EQ1", "aaa"],
          ["FL2", "bbb"],
        ])
      );
      expect(mock.queries[0]?.sql).toBe(
        'select "source_id", "fingerprint" from "disaster_events"'
      );
    });
  });

  describe("upsertEvents", () => {
    it("should not touch the database for an empty batch", async () => {
      const mock = createMockDb();

      await expect(
        new PostgisEventRepository(mock.db).upsertEvents([])
      ).resolves.toEqual({ inserted: 0, updated: 0 });
      expect(mock.log).toEqual([]);
    });

    it("should upsert inside one transaction and count inserts by xmax", async () => {
      const mock = createMockDb(() => [
        { source_id: "EQ1", xmax: "0" },
        { source_id: "FL2", xmax: "48213" },
      ]);

      const counts = await new PostgisEventRepository(mock.db).upsertEvents([
        planned("EQ1"),
        planned("FL2"),
        planned("TC3"),
      ]);

      expect(counts).toEqual({ inserted: 1, updated: 1 });
      expect(mock.log).toEqual(["BEGIN", "QUERY", "COMMIT"]);

      const query = mock.queries[0];
      expect(query?.sql).toContain("ST_SetSRID(ST_GeomFromGeoJSON(");
      expect(query?.sql).toContain("ON CONFLICT (source_id) DO UPDATE SET");
      expect(query?.sql).toContain(
        "WHERE disaster_events.fingerprint IS DISTINCT FROM EXCLUDED.fingerprint"
      );
      expect(query?.parameters.slice(0, 8)).toEqual([
        "EQ1",
        "earthquake",
        "green",
        '{"type":"Point","coordinates":[12.5,41.9]}',
        new Date("2024-04-30T08:15:00.000Z"),
        "{}",
        "fp-EQ1",
        FETCHED_AT,
      ]);
      expect(query?.parameters).toHaveLength(24);
    });

    it("should split large change sets into batches", async () => {
      const mock = createMockDb(() => []);

      await new PostgisEventRepository(mock.db, 2).upsertEvents([
        planned("EQ1"),
        planned("EQ2"),
        planned("EQ3"),
      ]);

      expect(mock.log).toEqual(["BEGIN", "QUERY", "QUERY", "COMMIT"]);
      expect(mock.queries.map((query) => query.parameters.length)).toEqual([16, 8]);
    });

    it("should roll back every batch when one fails", async () => {
      let calls = 0;
      const mock = createMockDb(() => {
        calls++;
        if (calls === 2) {
          throw new Error("deadlock detected");
        }
        return [{ source_id: "EQ1", xmax: "0" }];
      });

      await expect(
        new PostgisEventRepository(mock.db, 1).upsertEvents([planned("EQ1"), planned("EQ2")])
      ).rejects.toThrow("deadlock detected");
      expect(mock.log).toEqual(["BEGIN", "QUERY", "QUERY", "ROLLBACK"]);
    });
  });

  describe("findBySourceId", () => {
    it("should map the row and decode its geometry", async () => {
      const createdAt = new Date("2024-04-30T09:00:00.000Z");
      const mock = createMockDb(() => [
        {
          source_id: "EQ1",
          event_type: "earthquake",
          severity: "orange",
          geometry_json: '{"type":"Point","coordinates":[10,20]}',
          occurred_at: null,
          raw_attributes: { name: "Quake" },
          fingerprint: "aaa",
          fetched_at: FETCHED_AT,
          created_at: createdAt,
          updated_at: FETCHED_AT,
          version: 3,
        },
      ]);

      const event = await new PostgisEventRepository(mock.db).findBySourceId("EQ1");

      expect(event).toEqual({
        sourceId: "EQ1",
        eventType: "earthquake",
        severity: "orange",
        geometry: { type: "Point", coordinates: [10, 20] },
        occurredAt: null,
        rawAttributes: { name: "Quake" },
        fingerprint: "aaa",
        fetchedAt: FETCHED_AT,
        createdAt,
        updatedAt: FETCHED_AT,
        version: 3,
      });
      expect(mock.queries[0]?.sql).toContain('ST_AsGeoJSON(geometry) as "geometry_json"');
      expect(mock.queries[0]?.parameters).toEqual(["EQ1"]);
    });

    it("should return null for an unknown event", async () => {
      const mock = createMockDb(() => []);

      await expect(
        new PostgisEventRepository(mock.db).findBySourceId("XX0")
      ).resolves.toBeNull();
    });
  });
});
