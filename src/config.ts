/**
 * Process configuration
 *
 * Read once from the environment (and `.env`) at start-up, validated against
 * a TypeBox schema and frozen for the lifetime of the process.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ============================================================================
// Schema
// ============================================================================

const EnvironmentSchema = Type.Object({
  DATABASE_URL: Type.String({
    default: "postgresql://localhost:5432/disaster_events",
  }),
  DB_STATEMENT_TIMEOUT_MS: Type.Integer({ minimum: 1000, default: 30_000 }),
  XML_URL: Type.String({ default: "https://www.gdacs.org/xml/rss.xml" }),
  GEOJSON_URL: Type.String({
    default: "https://www.gdacs.org/Alerts/default.aspx",
  }),
  GEOJSON_FETCH_MODE: Type.Union(
    [Type.Literal("browser"), Type.Literal("http")],
    { default: "browser" }
  ),
  GEOJSON_RESPONSE_MATCH: Type.String({
    minLength: 1,
    default: "geteventlist",
  }),
  GEOJSON_TRIGGER_SELECTOR: Type.String({
    default: "a[href='javascript:onclick=downloadResult();']",
  }),
  BROWSER: Type.Union([Type.Literal("chrome"), Type.Literal("firefox")], {
    default: "chrome",
  }),
  BROWSER_EXECUTABLE_PATH: Type.Optional(Type.String({ minLength: 1 })),
  BROWSER_WS_ENDPOINT: Type.Optional(Type.String({ minLength: 1 })),
  FETCH_TIMEOUT_MS: Type.Integer({ minimum: 100, default: 30_000 }),
  BROWSER_TIMEOUT_MS: Type.Integer({ minimum: 100, default: 60_000 }),
  SYNC_INTERVAL_MS: Type.Integer({ minimum: 1000, default: 86_400_000 }),
  FAILURE_THRESHOLD: Type.Integer({ minimum: 1, default: 3 }),
  FAIL_FAST: Type.Boolean({ default: true }),
  HOST: Type.String({ default: "0.0.0.0" }),
  PORT: Type.Integer({ minimum: 0, maximum: 65_535, default: 3000 }),
});

type Environment = Static<typeof EnvironmentSchema>;

const ENV_KEYS = Object.keys(EnvironmentSchema.properties);

// ============================================================================
// Types
// ============================================================================

export type GeojsonFetchMode = Environment["GEOJSON_FETCH_MODE"];
export type BrowserName = Environment["BROWSER"];

export interface BrowserConfig {
  browser: BrowserName;
  executablePath?: string;
  wsEndpoint?: string;
}

export interface AppConfig {
  databaseUrl: string;
  dbStatementTimeoutMs: number;
  xmlUrl: string;
  geojsonUrl: string;
  geojsonFetchMode: GeojsonFetchMode;
  geojsonResponseMatch: string;
  geojsonTriggerSelector: string | undefined;
  browser: BrowserConfig;
  fetchTimeoutMs: number;
  browserTimeoutMs: number;
  syncIntervalMs: number;
  failureThreshold: number;
  failFast: boolean;
  host: string;
  port: number;
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load and validate configuration from an environment map.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const input: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value !== undefined && value !== "") {
      input[key] = value;
    }
  }

  const converted = Value.Default(
    EnvironmentSchema,
    Value.Convert(EnvironmentSchema, input)
  );

  if (!Value.Check(EnvironmentSchema, converted)) {
    const issues = [...Value.Errors(EnvironmentSchema, converted)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigError(issues);
  }

  const environment = converted;

  if (
    environment.GEOJSON_FETCH_MODE === "browser" &&
    environment.BROWSER === "firefox" &&
    environment.BROWSER_EXECUTABLE_PATH === undefined &&
    environment.BROWSER_WS_ENDPOINT === undefined
  ) {
    throw new ConfigError([
      "BROWSER_EXECUTABLE_PATH: required when BROWSER=firefox",
    ]);
  }

  return Object.freeze({
    databaseUrl: environment.DATABASE_URL,
    dbStatementTimeoutMs: environment.DB_STATEMENT_TIMEOUT_MS,
    xmlUrl: environment.XML_URL,
    geojsonUrl: environment.GEOJSON_URL,
    geojsonFetchMode: environment.GEOJSON_FETCH_MODE,
    geojsonResponseMatch: environment.GEOJSON_RESPONSE_MATCH,
    geojsonTriggerSelector:
      environment.GEOJSON_TRIGGER_SELECTOR === "none"
        ? undefined
        : environment.GEOJSON_TRIGGER_SELECTOR,
    browser: Object.freeze({
      browser: environment.BROWSER,
      executablePath: environment.BROWSER_EXECUTABLE_PATH,
      wsEndpoint: environment.BROWSER_WS_ENDPOINT,
    }),
    fetchTimeoutMs: environment.FETCH_TIMEOUT_MS,
    browserTimeoutMs: environment.BROWSER_TIMEOUT_MS,
    syncIntervalMs: environment.SYNC_INTERVAL_MS,
    failureThreshold: environment.FAILURE_THRESHOLD,
    failFast: environment.FAIL_FAST,
    host: environment.HOST,
    port: environment.PORT,
  });
}

/**
 * Database URL with the password masked, for display
 */
export function maskDatabaseUrl(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    if (url.password !== "") {
      url.password = "****";
    }
    return url.toString();
  } catch {
    return "<invalid url>";
  }
}
