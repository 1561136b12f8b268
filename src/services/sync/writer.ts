/**
 * Sync Writer - apply a change set to the event store
 */

import { syncLogger } from "../../logger.js";
import {
  CycleCancelledError,
  StorageError,
  ValidationError,
  errorMessage,
} from "./errors.js";
import { findGeometryIssue } from "./geometry.js";

import type { EventRepository } from "./repository.js";
import type {
  FailedRecord,
  PlannedWrite,
  SyncResult,
} from "../../types/index.js";

export interface ApplyOptions {
  signal?: AbortSignal;
}

export class SyncWriter {
  constructor(private repository: EventRepository) {}

  /**
   * Validate every planned write, then commit the valid ones in a single
   * transaction. Records failing validation are reported in `failed` and
   * never reach the store; a storage failure rolls back the whole batch.
   */
  async apply(
    toInsert: PlannedWrite[],
    toUpdate: PlannedWrite[],
    options: ApplyOptions = {}
  ): Promise<SyncResult> {
    const failed: FailedRecord[] = [];
    const accepted: PlannedWrite[] = [];

    for (const write of [...toInsert, ...toUpdate]) {
      const error = this.validate(write);
      if (error !== null) {
        syncLogger.warn(
          { sourceId: error.sourceId, reason: error.message },
          "Record failed validation, skipping"
        );
        failed.push({ sourceId: error.sourceId, reason: error.message });
        continue;
      }
      accepted.push(write);
    }

    if (accepted.length === 0) {
      return { insertedCount: 0, updatedCount: 0, failed };
    }

    if (options.signal?.aborted === true) {
      throw new CycleCancelledError("write transaction");
    }

    try {
      const { inserted, updated } = await this.repository.upsertEvents(accepted);
      return { insertedCount: inserted, updatedCount: updated, failed };
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`Transaction rolled back: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private validate({ event }: PlannedWrite): ValidationError | null {
    if (event.sourceId.trim() === "") {
      return new ValidationError(event.sourceId, "empty source identifier");
    }
    const issue = findGeometryIssue(event.geometry);
    return issue === null ? null : new ValidationError(event.sourceId, issue);
  }
}
