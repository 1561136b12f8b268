// Sync Services - Re-exports and wiring
import { createBrowserSessionFactory } from "../../scraper/browser.js";
import { SourceClient } from "../../scraper/client.js";
import { SyncPipeline } from "./pipeline.js";
import { PostgisEventRepository } from "./repository.js";
import { SyncScheduler, type SchedulerHooks } from "./scheduler.js";

import type { AppConfig } from "../../config.js";
import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

export { SyncPipeline, type CycleReport, type CycleStage } from "./pipeline.js";
export {
  SyncScheduler,
  type SchedulerHooks,
  type SchedulerState,
  type SchedulerStatus,
} from "./scheduler.js";
export { SyncWriter } from "./writer.js";
export {
  PostgisEventRepository,
  type EventRepository,
  type StoredEvent,
} from "./repository.js";

export function createSourceClient(config: AppConfig): SourceClient {
  return new SourceClient({
    xmlUrl: config.xmlUrl,
    geojsonUrl: config.geojsonUrl,
    geojsonMode: config.geojsonFetchMode,
    responseMatch: config.geojsonResponseMatch,
    triggerSelector: config.geojsonTriggerSelector,
    fetchTimeoutMs: config.fetchTimeoutMs,
    browserTimeoutMs: config.browserTimeoutMs,
    openBrowserSession: createBrowserSessionFactory(config.browser),
  });
}

export interface SyncServices {
  repository: PostgisEventRepository;
  pipeline: SyncPipeline;
  scheduler: SyncScheduler;
}

/**
 * Build the production object graph from configuration
 */
export function createSyncServices(
  config: AppConfig,
  db: Kysely<Database>,
  hooks?: SchedulerHooks
): SyncServices {
  const repository = new PostgisEventRepository(db);
  const pipeline = new SyncPipeline({
    fetcher: createSourceClient(config),
    repository,
  });
  const scheduler = new SyncScheduler(pipeline, {
    intervalMs: config.syncIntervalMs,
    failureThreshold: config.failureThreshold,
    hooks,
  });
  return { repository, pipeline, scheduler };
}
