/**
 * Event API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { DatabaseError, NotFoundError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  DateTimeSchema,
  NullableDateTimeSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { StoredEvent } from "../../services/sync/repository.js";
import type { EventDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";

export interface EventLookup {
  findBySourceId(sourceId: string): Promise<StoredEvent | null>;
}

// ============================================================================
// Schemas
// ============================================================================

const EventParamsSchema = Type.Object({
  sourceId: Type.String({ minLength: 1, maxLength: 128 }),
});

type EventParams = Static<typeof EventParamsSchema>;

const EventSchema = Type.Object({
  sourceId: Type.String(),
  eventType: Type.Union([Type.String(), Type.Null()]),
  severity: Type.Union([Type.String(), Type.Null()]),
  geometry: Type.Unknown(),
  occurredAt: NullableDateTimeSchema,
  rawAttributes: Type.Record(Type.String(), Type.Unknown()),
  fingerprint: Type.String(),
  fetchedAt: DateTimeSchema,
  createdAt: DateTimeSchema,
  updatedAt: DateTimeSchema,
  version: Type.Integer(),
});

// ============================================================================
// Helper Functions
// ============================================================================

export function formatEvent(event: StoredEvent): EventDto {
  return {
    sourceId: event.sourceId,
    eventType: event.eventType,
    severity: event.severity,
    geometry: event.geometry,
    occurredAt: event.occurredAt?.toISOString() ?? null,
    rawAttributes: event.rawAttributes,
    fingerprint: event.fingerprint,
    fetchedAt: event.fetchedAt.toISOString(),
    createdAt: event.createdAt.toISOString(),
    updatedAt: event.updatedAt.toISOString(),
    version: event.version,
  };
}

// ============================================================================
// Routes
// ============================================================================

export function registerEventRoutes(
  app: FastifyInstance,
  repository: EventLookup
): void {
  // GET /events/:sourceId
  app.get<{ Params: EventParams }>(
    "/events/:sourceId",
    {
      schema: {
        summary: "Get event by source identifier",
        description:
          "Returns one persisted event with its geometry as GeoJSON, e.g. EQ1234567",
        tags: ["Events"],
        params: EventParamsSchema,
        response: {
          200: createResponseSchema(EventSchema),
          404: ApiErrorSchema,
          503: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { sourceId } = request.params;

      let event: StoredEvent | null;
      try {
        event = await repository.findBySourceId(sourceId);
      } catch (error) {
        request.log.error({ err: error, sourceId }, "Event lookup failed");
        throw new DatabaseError("Event store unavailable");
      }

      if (event === null) {
        throw new NotFoundError(`Event ${sourceId} not found`);
      }

      return { data: formatEvent(event) };
    }
  );
}
