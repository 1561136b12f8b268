/**
 * Pipeline error taxonomy
 *
 * Record-level defects (ParseWarning values, ValidationError) never abort a
 * cycle. Document-level (ParseError), transport (FetchError) and transaction
 * (StorageError) failures abort the current cycle only.
 */

import type { FeedSource } from "../../types/index.js";

export type FetchErrorKind =
  | "network"
  | "http_status"
  | "browser"
  | "timeout"
  | "aborted";

export class FetchError extends Error {
  code = "FETCH_ERROR" as const;
  retryable = true;
  source: FeedSource;
  kind: FetchErrorKind;
  status?: number;

  constructor(
    source: FeedSource,
    kind: FetchErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.source = source;
    this.kind = kind;
    this.status = options?.status;
  }
}

export class ParseError extends Error {
  code = "PARSE_ERROR" as const;
  source: FeedSource;

  constructor(source: FeedSource, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ParseError";
    this.source = source;
  }
}

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  sourceId: string;

  constructor(sourceId: string, message: string) {
    super(message);
    this.name = "ValidationError";
    this.sourceId = sourceId;
  }
}

export class StorageError extends Error {
  code = "STORAGE_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "StorageError";
  }
}

export class CycleCancelledError extends Error {
  code = "CYCLE_CANCELLED" as const;

  constructor(checkpoint: string, position: "before" | "during" = "before") {
    super(`Cycle cancelled ${position} ${checkpoint}`);
    this.name = "CycleCancelledError";
  }
}

/**
 * Short machine-readable code for any thrown value
 */
export function errorCode(error: unknown): string {
  if (
    error instanceof FetchError ||
    error instanceof ParseError ||
    error instanceof StorageError ||
    error instanceof CycleCancelledError ||
    error instanceof ValidationError
  ) {
    return error.code;
  }
  return "INTERNAL_ERROR";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
