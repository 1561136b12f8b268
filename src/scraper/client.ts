import { feedLogger } from "../logger.js";
import { FetchError, errorMessage } from "../services/sync/errors.js";

import type { GeojsonFetchMode } from "../config.js";
import type { FeedSource } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface CaptureOptions {
  /** Substring identifying the network response that carries the GeoJSON */
  responseMatch: string;
  /** Element clicked after page load to make the page issue that request */
  triggerSelector?: string;
  timeoutMs: number;
}

/**
 * One scoped browser session. `release` is always called exactly once,
 * whatever the outcome of `captureResponse`.
 */
export interface BrowserSession {
  captureResponse(pageUrl: string, options: CaptureOptions): Promise<string>;
  release(): Promise<void>;
}

export type BrowserSessionFactory = () => Promise<BrowserSession>;

export interface FeedPayloads {
  geojson: string;
  xml: string;
}

/**
 * What the sync pipeline needs from the upstream source
 */
export interface FeedFetcher {
  fetchAll(signal?: AbortSignal): Promise<FeedPayloads>;
}

export interface SourceClientOptions {
  xmlUrl: string;
  geojsonUrl: string;
  geojsonMode: GeojsonFetchMode;
  responseMatch: string;
  triggerSelector?: string;
  fetchTimeoutMs: number;
  browserTimeoutMs: number;
  openBrowserSession: BrowserSessionFactory;
}

// ============================================================================
// Helpers
// ============================================================================

function elapsed(startTime: number): string {
  return `${String(Math.round(performance.now() - startTime))}ms`;
}

/**
 * Reject with `toError()` as soon as `signal` aborts, whatever `work` does
 */
function raceAbort<T>(
  work: Promise<T>,
  signal: AbortSignal,
  toError: () => Error
): Promise<T> {
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => {
      reject(toError());
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  return Promise.race([work, aborted]).finally(() => {
    if (onAbort !== undefined) {
      signal.removeEventListener("abort", onAbort);
    }
  });
}

// ============================================================================
// Source Client
// ============================================================================

export class SourceClient implements FeedFetcher {
  constructor(private options: SourceClientOptions) {}

  /**
   * Fetch the RSS/XML feed as text
   */
  async fetchXml(signal?: AbortSignal): Promise<string> {
    return this.httpGet("xml", this.options.xmlUrl, signal);
  }

  /**
   * Fetch the GeoJSON feed as text, either directly or through a browser
   * session that captures the page's own request for it
   */
  async fetchGeojson(signal?: AbortSignal): Promise<string> {
    if (this.options.geojsonMode === "http") {
      return this.httpGet("geojson", this.options.geojsonUrl, signal);
    }
    const { browserTimeoutMs, geojsonUrl } = this.options;
    const timeout = AbortSignal.timeout(browserTimeoutMs);
    const combined =
      signal === undefined ? timeout : AbortSignal.any([timeout, signal]);

    return raceAbort(this.captureWithBrowser(combined), combined, () =>
      this.transportError(
        "geojson",
        geojsonUrl,
        combined.reason,
        timeout,
        browserTimeoutMs,
        signal
      )
    );
  }

  /**
   * Fetch both feeds concurrently. Resolves only when both succeed;
   * otherwise rejects with the first failure (GeoJSON before XML).
   */
  async fetchAll(signal?: AbortSignal): Promise<FeedPayloads> {
    feedLogger.info("Fetching GeoJSON and XML feeds");

    const [geojson, xml] = await Promise.allSettled([
      this.fetchGeojson(signal),
      this.fetchXml(signal),
    ]);

    if (geojson.status === "rejected") {
      if (xml.status === "rejected") {
        feedLogger.warn(
          { error: errorMessage(xml.reason) },
          "XML fetch also failed"
        );
      }
      throw geojson.reason;
    }
    if (xml.status === "rejected") {
      throw xml.reason;
    }

    feedLogger.debug(
      { geojsonBytes: geojson.value.length, xmlBytes: xml.value.length },
      "Fetched both feeds"
    );

    return { geojson: geojson.value, xml: xml.value };
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private async httpGet(
    source: FeedSource,
    url: string,
    signal?: AbortSignal
  ): Promise<string> {
    const timeout = AbortSignal.timeout(this.options.fetchTimeoutMs);
    const combined =
      signal === undefined ? timeout : AbortSignal.any([timeout, signal]);

    feedLogger.debug({ source, url }, "Sending request to feed");
    const startTime = performance.now();

    let response: Response;
    try {
      response = await fetch(url, { signal: combined });
    } catch (error) {
      throw this.transportError(
        source,
        url,
        error,
        timeout,
        this.options.fetchTimeoutMs,
        signal
      );
    }

    feedLogger.debug(
      {
        source,
        url,
        status: response.status,
        statusText: response.statusText,
        duration: elapsed(startTime),
      },
      "Received response from feed"
    );

    if (!response.ok) {
      feedLogger.error(
        { source, status: response.status, statusText: response.statusText },
        "Feed request failed"
      );
      throw new FetchError(
        source,
        "http_status",
        `Failed to fetch ${source} feed: HTTP ${String(response.status)} ${response.statusText}`,
        { status: response.status }
      );
    }

    try {
      return await response.text();
    } catch (error) {
      throw this.transportError(
        source,
        url,
        error,
        timeout,
        this.options.fetchTimeoutMs,
        signal
      );
    }
  }

  private transportError(
    source: FeedSource,
    url: string,
    error: unknown,
    timeout: AbortSignal,
    timeoutMs: number,
    signal?: AbortSignal
  ): FetchError {
    if (signal?.aborted === true) {
      return new FetchError(source, "aborted", `${source} fetch aborted`, {
        cause: error,
      });
    }
    if (timeout.aborted) {
      return new FetchError(
        source,
        "timeout",
        `${source} fetch did not complete within ${String(timeoutMs)}ms`,
        { cause: error }
      );
    }
    return new FetchError(
      source,
      "network",
      `Failed to fetch ${url}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  // ==========================================================================
  // Browser
  // ==========================================================================

  /**
   * Open a session, capture the response and release the session exactly
   * once. An abort of `signal` releases the session early, which unblocks a
   * capture still waiting on the page.
   */
  private async captureWithBrowser(signal: AbortSignal): Promise<string> {
    const { geojsonUrl, responseMatch, triggerSelector, browserTimeoutMs } =
      this.options;
    const startTime = performance.now();

    let session: BrowserSession;
    try {
      session = await this.options.openBrowserSession();
    } catch (error) {
      throw new FetchError(
        "geojson",
        "browser",
        `Failed to start browser session: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    let released: Promise<void> | undefined;
    const release = (): Promise<void> => {
      released ??= this.releaseSession(session);
      return released;
    };
    const onAbort = (): void => {
      void release();
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      if (signal.aborted) {
        throw new FetchError("geojson", "aborted", "geojson fetch aborted");
      }
      const body = await session.captureResponse(geojsonUrl, {
        responseMatch,
        triggerSelector,
        timeoutMs: browserTimeoutMs,
      });
      feedLogger.debug(
        { url: geojsonUrl, bytes: body.length, duration: elapsed(startTime) },
        "Captured GeoJSON through browser session"
      );
      return body;
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(
        "geojson",
        "browser",
        `Browser session failed: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      signal.removeEventListener("abort", onAbort);
      await release();
    }
  }

  /**
   * Never rejects: a release failure is logged and must not mask the fetch
   * outcome
   */
  private async releaseSession(session: BrowserSession): Promise<void> {
    try {
      await session.release();
    } catch (error) {
      feedLogger.error({ error }, "Failed to release browser session");
    }
  }
}
