/**
 * API Request/Response Types
 */

import type { SchedulerState } from "../services/sync/scheduler.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sync Types
// ============================================================================

export interface CycleSummaryDto {
  startedAt: string;
  finishedAt: string;
  outcome: "SUCCEEDED" | "FAILED" | "CANCELLED";
  inserted: number;
  updated: number;
  unchanged: number;
  failedRecords: number;
  warnings: number;
  error: string | null;
}

export interface SyncStatusDto {
  state: SchedulerState;
  running: boolean;
  lastRunAt: string | null;
  nextRunAt: string | null;
  failureStreak: number;
  failureThreshold: number;
  lastFailure: {
    code: string;
    message: string;
    at: string;
  } | null;
  recentCycles: CycleSummaryDto[];
}

// ============================================================================
// Event Types
// ============================================================================

export interface EventDto {
  sourceId: string;
  eventType: string | null;
  severity: string | null;
  geometry: unknown;
  occurredAt: string | null;
  rawAttributes: Record<string, unknown>;
  fingerprint: string;
  fetchedAt: string;
  createdAt: string;
  updatedAt: string;
  version: number;
}
