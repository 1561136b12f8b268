/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Disaster Feed Sync",
        description:
          "Operations API for the GDACS disaster event sync. Exposes the scheduler state, " +
          "lets operators trigger a cycle early and look up persisted events by source identifier.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Liveness probe",
        },
        {
          name: "Sync",
          description: "Scheduler status and manual cycle trigger",
        },
        {
          name: "Events",
          description: "Persisted disaster events",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
