/**
 * puppeteer-core browser sessions for the GeoJSON feed.
 *
 * The alerts page builds its event list from an XHR; the session loads the
 * page, optionally clicks the download trigger, and returns the body of the
 * first successful response whose URL contains the configured match.
 * Nothing is written to disk.
 */

import puppeteer, { TimeoutError, type Browser, type Page } from "puppeteer-core";

import { feedLogger } from "../logger.js";
import { FetchError } from "../services/sync/errors.js";

import type {
  BrowserSession,
  BrowserSessionFactory,
  CaptureOptions,
} from "./client.js";
import type { BrowserConfig } from "../config.js";

class PuppeteerSession implements BrowserSession {
  constructor(
    private browser: Browser,
    private remote: boolean
  ) {}

  async captureResponse(
    pageUrl: string,
    { responseMatch, triggerSelector, timeoutMs }: CaptureOptions
  ): Promise<string> {
    const page = await this.browser.newPage();

    try {
      const [response] = await Promise.all([
        page.waitForResponse(
          (candidate) => candidate.url().includes(responseMatch) && candidate.ok(),
          { timeout: timeoutMs }
        ),
        this.loadPage(page, pageUrl, triggerSelector, timeoutMs),
      ]);
      return await response.text();
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new FetchError(
          "geojson",
          "timeout",
          `No response matching "${responseMatch}" within ${String(timeoutMs)}ms`,
          { cause: error }
        );
      }
      throw error;
    } finally {
      await page.close().catch((error: unknown) => {
        feedLogger.warn({ error }, "Failed to close browser page");
      });
    }
  }

  private async loadPage(
    page: Page,
    pageUrl: string,
    triggerSelector: string | undefined,
    timeoutMs: number
  ): Promise<void> {
    await page.goto(pageUrl, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    if (triggerSelector === undefined) {
      return;
    }
    const trigger = await page.waitForSelector(triggerSelector, {
      visible: true,
      timeout: timeoutMs,
    });
    if (trigger === null) {
      throw new FetchError(
        "geojson",
        "browser",
        `Trigger element "${triggerSelector}" not found`
      );
    }
    await trigger.click();
  }

  async release(): Promise<void> {
    if (this.remote) {
      await this.browser.disconnect();
    } else {
      await this.browser.close();
    }
  }
}

/**
 * Session factory for the configured browser: connect to a running browser
 * when a WebSocket endpoint is set, otherwise launch a headless one.
 */
export function createBrowserSessionFactory(
  config: BrowserConfig
): BrowserSessionFactory {
  return async () => {
    if (config.wsEndpoint !== undefined) {
      feedLogger.debug({ endpoint: config.wsEndpoint }, "Connecting to browser");
      const browser = await puppeteer.connect({
        browserWSEndpoint: config.wsEndpoint,
      });
      return new PuppeteerSession(browser, true);
    }

    feedLogger.debug(
      { browser: config.browser, executablePath: config.executablePath },
      "Launching headless browser"
    );
    const browser = await puppeteer.launch({
      browser: config.browser,
      headless: true,
      executablePath: config.executablePath,
      channel:
        config.executablePath === undefined && config.browser === "chrome"
          ? "chrome"
          : undefined,
    });
    return new PuppeteerSession(browser, false);
  };
}
