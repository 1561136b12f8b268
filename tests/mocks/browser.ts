/**
 * Fake browser sessions for SourceClient tests
 */

import { vi, type Mock } from "vitest";

import type {
  BrowserSession,
  CaptureOptions,
} from "../../src/scraper/client.js";

export interface FakeBrowserSession extends BrowserSession {
  captureResponse: Mock<(pageUrl: string, options: CaptureOptions) => Promise<string>>;
  release: Mock<() => Promise<void>>;
}

export function createFakeSession(body = "{}"): FakeBrowserSession {
  return {
    captureResponse: vi
      .fn<(pageUrl: string, options: CaptureOptions) => Promise<string>>()
      .mockResolvedValue(body),
    release: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  };
}
