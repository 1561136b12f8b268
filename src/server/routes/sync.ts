/**
 * Sync API Routes
 *
 * Scheduler status and on-demand cycle trigger.
 */

import { Type } from "@sinclair/typebox";

import { ConflictError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  CycleOutcomeSchema,
  DateTimeSchema,
  NullableDateTimeSchema,
  SchedulerStateSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type {
  CycleRecord,
  SchedulerStatus,
} from "../../services/sync/scheduler.js";
import type { CycleSummaryDto, SyncStatusDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";

/**
 * What the routes need from the scheduler
 */
export interface SyncControl {
  getStatus(): SchedulerStatus;
  triggerNow(): boolean;
}

// ============================================================================
// Schemas
// ============================================================================

const CycleSummarySchema = Type.Object({
  startedAt: DateTimeSchema,
  finishedAt: DateTimeSchema,
  outcome: CycleOutcomeSchema,
  inserted: Type.Integer(),
  updated: Type.Integer(),
  unchanged: Type.Integer(),
  failedRecords: Type.Integer(),
  warnings: Type.Integer(),
  error: Type.Union([Type.String(), Type.Null()]),
});

const SyncStatusSchema = Type.Object({
  state: SchedulerStateSchema,
  running: Type.Boolean(),
  lastRunAt: NullableDateTimeSchema,
  nextRunAt: NullableDateTimeSchema,
  failureStreak: Type.Integer(),
  failureThreshold: Type.Integer(),
  lastFailure: Type.Union([
    Type.Object({
      code: Type.String(),
      message: Type.String(),
      at: DateTimeSchema,
    }),
    Type.Null(),
  ]),
  recentCycles: Type.Array(CycleSummarySchema),
});

const TriggerResponseSchema = createResponseSchema(
  Type.Object({
    triggered: Type.Literal(true),
    message: Type.String(),
  })
);

// ============================================================================
// Helper Functions
// ============================================================================

function toIso(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}

export function formatCycle(cycle: CycleRecord): CycleSummaryDto {
  const { report } = cycle;
  return {
    startedAt: cycle.startedAt.toISOString(),
    finishedAt: cycle.finishedAt.toISOString(),
    outcome: cycle.outcome,
    inserted: report?.insertedCount ?? 0,
    updated: report?.updatedCount ?? 0,
    unchanged: report?.unchangedCount ?? 0,
    failedRecords: report?.failed.length ?? 0,
    warnings: report?.warnings.length ?? 0,
    error: cycle.failure?.message ?? null,
  };
}

export function formatStatus(status: SchedulerStatus): SyncStatusDto {
  const { lastFailure } = status;
  return {
    state: status.state,
    running: status.running,
    lastRunAt: toIso(status.lastRunAt),
    nextRunAt: toIso(status.nextRunAt),
    failureStreak: status.failureStreak,
    failureThreshold: status.failureThreshold,
    lastFailure:
      lastFailure === null
        ? null
        : {
            code: lastFailure.code,
            message: lastFailure.message,
            at: lastFailure.at.toISOString(),
          },
    recentCycles: status.recentCycles.map(formatCycle),
  };
}

// ============================================================================
// Routes
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  scheduler: SyncControl
): void {
  // GET /sync/status
  app.get(
    "/sync/status",
    {
      schema: {
        summary: "Scheduler status",
        description:
          "Current scheduler state, failure streak, last failure and the outcome of recent cycles",
        tags: ["Sync"],
        response: {
          200: createResponseSchema(SyncStatusSchema),
        },
      },
    },
    () => ({ data: formatStatus(scheduler.getStatus()) })
  );

  // POST /sync/run
  app.post(
    "/sync/run",
    {
      schema: {
        summary: "Run a cycle now",
        description:
          "Wakes a sleeping scheduler so the next cycle starts immediately. Rejected while a cycle is running or after the scheduler stopped.",
        tags: ["Sync"],
        response: {
          202: TriggerResponseSchema,
          409: ApiErrorSchema,
        },
      },
    },
    async (_request, reply) => {
      if (!scheduler.triggerNow()) {
        const { state } = scheduler.getStatus();
        throw new ConflictError(
          state === "STOPPED"
            ? "Scheduler is stopped"
            : `Scheduler is not sleeping (state: ${state})`,
          { state }
        );
      }

      return reply.status(202).send({
        data: { triggered: true, message: "Sync cycle triggered" },
      });
    }
  );
}
