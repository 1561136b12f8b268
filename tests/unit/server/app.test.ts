import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";

import { buildServer } from "../../../src/server/app.js";

import type { FastifyInstance } from "fastify";

describe("server/app", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildServer(
      {
        scheduler: {
          getStatus: vi.fn(),
          triggerNow: vi.fn(() => false),
        },
        repository: {
          findBySourceId: vi.fn(() => Promise.resolve(null)),
        },
      },
      { logger: false }
    );
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("should answer the health check", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("should document the versioned routes", async () => {
    const response = await app.inject({ method: "GET", url: "/openapi.json" });

    expect(response.statusCode).toBe(200);
    const document = response.json();
    expect(document.info.title).toBe("Disaster Feed Sync");
    expect(Object.keys(document.paths)).toEqual(
      expect.arrayContaining([
        "/health",
        "/api/v1/sync/status",
        "/api/v1/sync/run",
        "/api/v1/events/{sourceId}",
      ])
    );
  });

  it("should route events through the error handler", async () => {
    const response = await app.inject({ method: "GET", url: "/api/v1/events/EQ1" });

    expect(response.statusCode).toBe(404);
    expect(response.json().message).toBe("Event EQ1 not found");
  });
});
