import pino from "pino";
import { describe, it, expect } from "vitest";

import { fastifyLoggerConfig, loggerOptions } from "../../src/logger.js";

function capture(): { lines: string[]; log: pino.Logger } {
  const lines: string[] = [];
  const log = pino(loggerOptions, {
    write: (line: string) => {
      lines.push(line);
    },
  });
  return { lines, log };
}

describe("logger", () => {
  it("should serialize errors logged under the error key", () => {
    const { lines, log } = capture();

    log.error({ error: new Error("db down") }, "Sync cycle failed");

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry.msg).toBe("Sync cycle failed");
    expect(entry.service).toBe("disaster-feed-sync");
    expect(entry.error.type).toBe("Error");
    expect(entry.error.message).toBe("db down");
    expect(typeof entry.error.stack).toBe("string");
  });

  it("should write ISO timestamps", () => {
    const { lines, log } = capture();

    log.error("Feed request failed");

    const entry = JSON.parse(lines[0] ?? "{}");
    expect(new Date(entry.time).toISOString()).toBe(entry.time);
  });

  it("should tag the Fastify logger as the server module", () => {
    expect(fastifyLoggerConfig.base).toEqual({
      service: "disaster-feed-sync",
      pid: process.pid,
      module: "server",
    });
    expect(fastifyLoggerConfig.level).toBe(loggerOptions.level);
  });
});
