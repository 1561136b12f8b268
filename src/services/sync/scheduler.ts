/**
 * Scheduler Loop
 *
 * Runs the sync pipeline forever on a fixed period measured from each
 * cycle's start. A failed cycle is recorded and the loop sleeps until the
 * next slot; only `stop()` ends it.
 *
 *   IDLE → FETCHING → PARSING → RECONCILING → DIFFING → WRITING → SLEEPING → IDLE
 *   any stage ──failure──→ SLEEPING
 *   any state ──stop()──→ STOPPED
 */

import { syncLogger } from "../../logger.js";
import { sleep as defaultSleep, systemClock, type Clock, type SleepFn } from "./clock.js";
import { CycleCancelledError, errorCode, errorMessage } from "./errors.js";

import type { CycleReport, RunCycleOptions } from "./pipeline.js";

// ============================================================================
// Types
// ============================================================================

export type SchedulerState =
  | "IDLE"
  | "FETCHING"
  | "PARSING"
  | "RECONCILING"
  | "DIFFING"
  | "WRITING"
  | "SLEEPING"
  | "STOPPED";

export type CycleOutcome = "SUCCEEDED" | "FAILED" | "CANCELLED";

export interface CycleFailure {
  code: string;
  message: string;
  at: Date;
  error: unknown;
}

export interface CycleRecord {
  startedAt: Date;
  finishedAt: Date;
  outcome: CycleOutcome;
  report: CycleReport | null;
  failure: CycleFailure | null;
}

export interface SchedulerHooks {
  onStateChange?: (state: SchedulerState, previous: SchedulerState) => void;
  onCycleSucceeded?: (report: CycleReport) => void;
  onCycleFailed?: (failure: CycleFailure, streak: number) => void;
  onFailureThresholdExceeded?: (streak: number, failure: CycleFailure) => void;
}

/**
 * The part of SyncPipeline the scheduler drives
 */
export interface CycleRunner {
  runCycle(options: RunCycleOptions): Promise<CycleReport>;
}

export interface SchedulerOptions {
  intervalMs: number;
  failureThreshold: number;
  clock?: Clock;
  sleep?: SleepFn;
  hooks?: SchedulerHooks;
}

export interface SchedulerStatus {
  state: SchedulerState;
  running: boolean;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
  failureStreak: number;
  failureThreshold: number;
  lastFailure: CycleFailure | null;
  recentCycles: CycleRecord[];
}

export const CYCLE_HISTORY_SIZE = 20;

// ============================================================================
// Default Hooks
// ============================================================================

export const loggingHooks: Required<Omit<SchedulerHooks, "onStateChange">> = {
  onCycleSucceeded: (report) => {
    syncLogger.debug(
      { durationMs: report.finishedAt.getTime() - report.startedAt.getTime() },
      "Cycle succeeded"
    );
  },
  onCycleFailed: (failure, streak) => {
    syncLogger.error(
      { code: failure.code, error: failure.error, streak },
      `Sync cycle failed: ${failure.message}`
    );
  },
  onFailureThresholdExceeded: (streak, failure) => {
    syncLogger.error(
      { streak, code: failure.code },
      `${String(streak)} consecutive sync cycles failed`
    );
  },
};

// ============================================================================
// Scheduler
// ============================================================================

export class SyncScheduler {
  private state: SchedulerState = "IDLE";
  private running = false;
  private stopController = new AbortController();
  private wakeController: AbortController | null = null;

  private failureStreak = 0;
  private lastRunAt: Date | null = null;
  private nextRunAt: Date | null = null;
  private lastFailure: CycleFailure | null = null;
  private history: CycleRecord[] = [];

  private clock: Clock;
  private sleep: SleepFn;
  private hooks: SchedulerHooks;

  constructor(
    private pipeline: CycleRunner,
    private options: SchedulerOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.hooks = { ...loggingHooks, ...options.hooks };
  }

  /**
   * Loop until stop(). Resolves once the state is STOPPED.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error("Scheduler is already running");
    }
    if (this.state === "STOPPED") {
      throw new Error("Scheduler has been stopped");
    }
    this.running = true;
    const stopSignal = this.stopController.signal;

    syncLogger.info(
      { intervalMs: this.options.intervalMs },
      "Scheduler started"
    );

    try {
      while (!stopSignal.aborted) {
        const startedAt = this.clock.now();
        await this.runCycle(startedAt);
        if (stopSignal.aborted) {
          break;
        }

        const nextRunAt = new Date(startedAt.getTime() + this.options.intervalMs);
        const waitMs = Math.max(0, nextRunAt.getTime() - this.clock.now().getTime());
        this.nextRunAt = nextRunAt;
        this.transition("SLEEPING");

        this.wakeController = new AbortController();
        await this.sleep(
          waitMs,
          AbortSignal.any([stopSignal, this.wakeController.signal])
        );
        this.wakeController = null;

        if (!stopSignal.aborted) {
          this.nextRunAt = null;
          this.transition("IDLE");
        }
      }
    } finally {
      this.running = false;
      this.nextRunAt = null;
      this.wakeController = null;
      this.transition("STOPPED");
      syncLogger.info("Scheduler stopped");
    }
  }

  /**
   * Request the loop to end. Interrupts a sleep immediately; a cycle in
   * progress stops at its next checkpoint.
   */
  stop(): void {
    if (this.stopController.signal.aborted) {
      return;
    }
    syncLogger.info({ state: this.state }, "Stop requested");
    this.stopController.abort();
    if (!this.running) {
      this.transition("STOPPED");
    }
  }

  /**
   * Wake a sleeping scheduler so the next cycle starts now.
   * Returns false when no sleep was interrupted.
   */
  triggerNow(): boolean {
    if (this.state !== "SLEEPING" || this.wakeController === null) {
      return false;
    }
    syncLogger.info("Cycle triggered manually");
    this.wakeController.abort();
    return true;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      running: this.running,
      lastRunAt: this.lastRunAt,
      nextRunAt: this.nextRunAt,
      failureStreak: this.failureStreak,
      failureThreshold: this.options.failureThreshold,
      lastFailure: this.lastFailure,
      recentCycles: [...this.history],
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async runCycle(startedAt: Date): Promise<void> {
    this.lastRunAt = startedAt;

    try {
      const report = await this.pipeline.runCycle({
        signal: this.stopController.signal,
        onStage: (stage) => {
          this.transition(stage);
        },
      });
      this.failureStreak = 0;
      this.record({
        startedAt,
        finishedAt: this.clock.now(),
        outcome: "SUCCEEDED",
        report,
        failure: null,
      });
      this.notify(() => this.hooks.onCycleSucceeded?.(report));
    } catch (error) {
      const failure: CycleFailure = {
        code: errorCode(error),
        message: errorMessage(error),
        at: this.clock.now(),
        error,
      };

      if (error instanceof CycleCancelledError) {
        syncLogger.info({ reason: failure.message }, "Cycle cancelled");
        this.record({
          startedAt,
          finishedAt: failure.at,
          outcome: "CANCELLED",
          report: null,
          failure,
        });
        return;
      }

      this.failureStreak++;
      this.lastFailure = failure;
      this.record({
        startedAt,
        finishedAt: failure.at,
        outcome: "FAILED",
        report: null,
        failure,
      });
      const streak = this.failureStreak;
      this.notify(() => this.hooks.onCycleFailed?.(failure, streak));

      if (streak > this.options.failureThreshold) {
        this.notify(() => this.hooks.onFailureThresholdExceeded?.(streak, failure));
      }
    }
  }

  private record(cycle: CycleRecord): void {
    this.history.push(cycle);
    if (this.history.length > CYCLE_HISTORY_SIZE) {
      this.history.shift();
    }
  }

  private transition(next: SchedulerState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    syncLogger.debug({ from: previous, to: next }, "Scheduler state change");
    this.notify(() => this.hooks.onStateChange?.(next, previous));
  }

  /**
   * A throwing hook is logged and never affects the loop
   */
  private notify(hook: () => void): void {
    try {
      hook();
    } catch (error) {
      syncLogger.error({ error }, "Scheduler hook threw");
    }
  }
}
