/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerEventRoutes, type EventLookup } from "./events.js";
import { registerSyncRoutes, type SyncControl } from "./sync.js";

import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

export interface ApiDependencies {
  scheduler: SyncControl;
  repository: EventLookup;
}

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDependencies
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  // API v1 routes
  await app.register(
    async (api) => {
      registerSyncRoutes(api, deps.scheduler);
      registerEventRoutes(api, deps.repository);
    },
    { prefix: "/api/v1" }
  );
}
