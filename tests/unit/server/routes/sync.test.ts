import Fastify, { type FastifyInstance } from "fastify";
import {
  describe,
  it,
  expect,
  vi,
  beforeAll,
  afterAll,
  beforeEach,
} from "vitest";

import { errorHandler } from "../../../../src/server/plugins/error-handler.js";
import { registerSyncRoutes } from "../../../../src/server/routes/sync.js";

import type { CycleReport } from "../../../../src/services/sync/pipeline.js";
import type { SchedulerStatus } from "../../../../src/services/sync/scheduler.js";

// Sample fixtures
const sampleReport: CycleReport = {
  startedAt: new Date("2024-05-01T00:00:00.000Z"),
  finishedAt: new Date("2024-05-01T00:00:42.000Z"),
  parsed: { geojson: 12, xml: 10 },
  warnings: [{ source: "xml", index: 4, reason: "missing source identifier" }],
  dropped: [],
  canonicalCount: 12,
  insertedCount: 3,
  updatedCount: 2,
  unchangedCount: 6,
  failed: [{ sourceId: "EQ9", reason: "longitude 200 out of range" }],
};

const sampleStatus: SchedulerStatus = {
  state: "SLEEPING",
  running: true,
  lastRunAt: new Date("2024-05-02T00:00:00.000Z"),
  nextRunAt: new Date("2024-05-03T00:00:00.000Z"),
  failureStreak: 1,
  failureThreshold: 3,
  lastFailure: {
    code: "FETCH_ERROR",
    message: "Failed to fetch xml feed: HTTP 503 Service Unavailable",
    at: new Date("2024-05-02T00:00:05.000Z"),
    error: new Error("Failed to fetch xml feed: HTTP 503 Service Unavailable"),
  },
  recentCycles: [
    {
      startedAt: sampleReport.startedAt,
      finishedAt: sampleReport.finishedAt,
      outcome: "SUCCEEDED",
      report: sampleReport,
      failure: null,
    },
    {
      startedAt: new Date("2024-05-02T00:00:00.000Z"),
      finishedAt: new Date("2024-05-02T00:00:05.000Z"),
      outcome: "FAILED",
      report: null,
      failure: {
        code: "FETCH_ERROR",
        message: "Failed to fetch xml feed: HTTP 503 Service Unavailable",
        at: new Date("2024-05-02T00:00:05.000Z"),
        error: null,
      },
    },
  ],
};

const scheduler = {
  getStatus: vi.fn<() => SchedulerStatus>(),
  triggerNow: vi.fn<() => boolean>(),
};

describe("server/routes/sync", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    await app.register(errorHandler);

    app.register(
      async (instance) => {
        registerSyncRoutes(instance, scheduler);
      },
      { prefix: "/api/v1" }
    );

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    vi.clearAllMocks();
    scheduler.getStatus.mockReturnValue(sampleStatus);
  });

  describe("GET /api/v1/sync/status", () => {
    it("should return the scheduler status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/status",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: {
          state: "SLEEPING",
          running: true,
          lastRunAt: "2024-05-02T00:00:00.000Z",
          nextRunAt: "2024-05-03T00:00:00.000Z",
          failureStreak: 1,
          failureThreshold: 3,
          lastFailure: {
            code: "FETCH_ERROR",
            message: "Failed to fetch xml feed: HTTP 503 Service Unavailable",
            at: "2024-05-02T00:00:05.000Z",
          },
          recentCycles: [
            {
              startedAt: "2024-05-01T00:00:00.000Z",
              finishedAt: "2024-05-01T00:00:42.000Z",
              outcome: "SUCCEEDED",
              inserted: 3,
              updated: 2,
              unchanged: 6,
              failedRecords: 1,
              warnings: 1,
              error: null,
            },
            {
              startedAt: "2024-05-02T00:00:00.000Z",
              finishedAt: "2024-05-02T00:00:05.000Z",
              outcome: "FAILED",
              inserted: 0,
              updated: 0,
              unchanged: 0,
              failedRecords: 0,
              warnings: 0,
              error: "Failed to fetch xml feed: HTTP 503 Service Unavailable",
            },
          ],
        },
      });
    });

    it("should handle a scheduler that has not run yet", async () => {
      scheduler.getStatus.mockReturnValue({
        state: "IDLE",
        running: false,
        lastRunAt: null,
        nextRunAt: null,
        failureStreak: 0,
        failureThreshold: 3,
        lastFailure: null,
        recentCycles: [],
      });

      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/status",
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data.lastRunAt).toBeNull();
      expect(body.data.lastFailure).toBeNull();
      expect(body.data.recentCycles).toEqual([]);
    });
  });

  describe("POST /api/v1/sync/run", () => {
    it("should wake a sleeping scheduler", async () => {
      scheduler.triggerNow.mockReturnValue(true);

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/run",
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({
        data: { triggered: true, message: "Sync cycle triggered" },
      });
      expect(scheduler.triggerNow).toHaveBeenCalledTimes(1);
    });

    it("should reject while a cycle is running", async () => {
      scheduler.triggerNow.mockReturnValue(false);
      scheduler.getStatus.mockReturnValue({ ...sampleStatus, state: "WRITING" });

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/run",
      });

      expect(response.statusCode).toBe(409);
      const body = response.json();
      expect(body.error).toBe("CONFLICT");
      expect(body.message).toBe("Scheduler is not sleeping (state: WRITING)");
      expect(body.details).toEqual({ state: "WRITING" });
    });

    it("should reject once the scheduler stopped", async () => {
      scheduler.triggerNow.mockReturnValue(false);
      scheduler.getStatus.mockReturnValue({ ...sampleStatus, state: "STOPPED" });

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/run",
      });

      expect(response.statusCode).toBe(409);
      expect(response.json().message).toBe("Scheduler is stopped");
    });
  });
});
