import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

function isLevel(value: string): value is pino.Level {
  return ["fatal", "error", "warn", "info", "debug", "trace"].includes(value);
}

const STREAM_LEVEL: pino.Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Tee to stdout and the log file
  const streams: pino.StreamEntry[] = [
    { level: STREAM_LEVEL, stream: process.stdout },
    {
      level: STREAM_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

// Call sites log failures under `error`; pino only serializes `err` by default
export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { service: "disaster-feed-sync", pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
    err: pino.stdSerializers.err,
  },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Fastify takes the same options and stream, tagged as the server module
export const fastifyLoggerConfig: LoggerOptions & { stream?: DestinationStream } = {
  ...loggerOptions,
  base: { ...loggerOptions.base, module: "server" },
  ...(destination !== undefined ? { stream: destination } : {}),
};

// Child loggers for different modules
export const feedLogger = logger.child({ module: "feed" });
export const dbLogger = logger.child({ module: "database" });
export const syncLogger = logger.child({ module: "sync" });
export const serverLogger = logger.child({ module: "server" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
