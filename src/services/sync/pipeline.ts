/**
 * Sync Pipeline - one fetch → parse → reconcile → diff → write cycle
 */

import { syncLogger } from "../../logger.js";
import { parseGeojsonFeed } from "../../parsers/geojson.js";
import { parseXmlFeed } from "../../parsers/xml.js";
import { diff } from "./change-detector.js";
import { systemClock, type Clock } from "./clock.js";
import { CycleCancelledError, StorageError, errorMessage } from "./errors.js";
import { reconcile } from "./reconcile.js";
import { SyncWriter } from "./writer.js";

import type { EventRepository } from "./repository.js";
import type { FeedFetcher } from "../../scraper/client.js";
import type {
  DroppedRecord,
  FailedRecord,
  ParseWarning,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type CycleStage =
  | "FETCHING"
  | "PARSING"
  | "RECONCILING"
  | "DIFFING"
  | "WRITING";

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  parsed: { geojson: number; xml: number };
  warnings: ParseWarning[];
  dropped: DroppedRecord[];
  canonicalCount: number;
  insertedCount: number;
  updatedCount: number;
  unchangedCount: number;
  failed: FailedRecord[];
}

export interface RunCycleOptions {
  signal?: AbortSignal;
  /** Called as the cycle enters each stage */
  onStage?: (stage: CycleStage) => void;
}

export interface SyncPipelineDeps {
  fetcher: FeedFetcher;
  repository: EventRepository;
  clock?: Clock;
}

// ============================================================================
// Pipeline
// ============================================================================

export class SyncPipeline {
  private fetcher: FeedFetcher;
  private repository: EventRepository;
  private writer: SyncWriter;
  private clock: Clock;

  constructor(deps: SyncPipelineDeps) {
    this.fetcher = deps.fetcher;
    this.repository = deps.repository;
    this.writer = new SyncWriter(deps.repository);
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Run a single cycle. Throws on any cycle-level failure (FetchError,
   * ParseError, StorageError, CycleCancelledError); record-level defects are
   * returned in the report instead.
   */
  async runCycle(options: RunCycleOptions = {}): Promise<CycleReport> {
    const { signal, onStage } = options;
    const startedAt = this.clock.now();

    const enter = (stage: CycleStage): void => {
      if (signal?.aborted === true) {
        throw new CycleCancelledError(stage.toLowerCase());
      }
      onStage?.(stage);
    };

    enter("FETCHING");
    const payloads = await this.fetch(signal);
    const fetchedAt = this.clock.now();

    enter("PARSING");
    const geojson = parseGeojsonFeed(payloads.geojson, fetchedAt);
    const xml = parseXmlFeed(payloads.xml, fetchedAt);
    const warnings = [...geojson.warnings, ...xml.warnings];
    for (const warning of warnings) {
      syncLogger.warn(warning, "Skipped feed record");
    }

    enter("RECONCILING");
    const { events, dropped } = reconcile(geojson.events, xml.events);
    for (const record of dropped) {
      syncLogger.warn(record, "Dropped event during reconciliation");
    }

    enter("DIFFING");
    const persisted = await this.loadPersistedIndex();
    const changes = diff(events, persisted);

    enter("WRITING");
    const result = await this.writer.apply(changes.toInsert, changes.toUpdate, {
      signal,
    });

    const report: CycleReport = {
      startedAt,
      finishedAt: this.clock.now(),
      parsed: { geojson: geojson.events.length, xml: xml.events.length },
      warnings,
      dropped,
      canonicalCount: events.length,
      insertedCount: result.insertedCount,
      updatedCount: result.updatedCount,
      unchangedCount: changes.unchanged.length,
      failed: result.failed,
    };

    syncLogger.info(
      {
        canonical: report.canonicalCount,
        inserted: report.insertedCount,
        updated: report.updatedCount,
        unchanged: report.unchangedCount,
        failed: report.failed.length,
        warnings: warnings.length,
        dropped: dropped.length,
      },
      "Sync cycle completed"
    );

    return report;
  }

  private async fetch(signal?: AbortSignal): Promise<{ geojson: string; xml: string }> {
    try {
      return await this.fetcher.fetchAll(signal);
    } catch (error) {
      if (signal?.aborted === true) {
        throw new CycleCancelledError("fetching", "during");
      }
      throw error;
    }
  }

  private async loadPersistedIndex(): Promise<Map<string, string>> {
    try {
      return await this.repository.loadFingerprints();
    } catch (error) {
      throw new StorageError(
        `Failed to read persisted fingerprints: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
