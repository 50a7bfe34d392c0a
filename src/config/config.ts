// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";

import { Region, SourceName } from "../core/types.js";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const SOURCE_NAMES = Object.values(SourceName);

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "staging", "production", "test"]).default("development"),
  PORT: positiveInt(3000),
  LOG_LEVEL: z.string().default("info"),

  SOURCES_FILE: z.string().default("config/sources.yaml"),
  SOURCE_PRIORITY: z.string().default(""),

  SEARCH_PER_SOURCE_LIMIT: positiveInt(50),
  SEARCH_SUFFICIENT_COUNT: positiveInt(10),
  SEARCH_PER_CALL_TIMEOUT_MS: positiveInt(5_000),
  SEARCH_PASS_TIMEOUT_MS: positiveInt(15_000),
  SEARCH_MAX_CONCURRENCY: positiveInt(8),
  SEARCH_MAX_RETRIES: nonNegativeInt(1),
  SEARCH_RETRY_BASE_DELAY_MS: nonNegativeInt(250),
  SEARCH_MAX_CROSS_REFERENCE_LOOKUPS: nonNegativeInt(20),
  SEARCH_DEFAULT_LIMIT: positiveInt(20),
  SEARCH_MAX_LIMIT: positiveInt(50),
  SEARCH_DEFAULT_REGION: z.nativeEnum(Region).default(Region.US),

  CACHE_ENABLED: flag("true"),
  CACHE_MAX_ENTRIES: positiveInt(1_000),
  CACHE_TTL_SECONDS: positiveInt(604_800), // 1 week
  CACHE_SWEEP_INTERVAL_MS: nonNegativeInt(300_000),
  SUGGESTION_TTL_SECONDS: positiveInt(604_800),

  METRICS_ENABLED: flag("true"),
  METRICS_REPORT_INTERVAL_MS: nonNegativeInt(60_000),

  DATABASE_URL: z.string().min(1).optional(),
  STORE_STALE_AFTER_SECONDS: positiveInt(604_800),
  STORE_JANITOR_INTERVAL_MS: nonNegativeInt(3_600_000),
});

/**
 * Parse a comma-separated priority list. Empty input means "use the order
 * of the sources file".
 */
export function parseSourcePriority(raw: string): SourceName[] {
  const names = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  return names.map((name) => {
    const match = SOURCE_NAMES.find((known) => known === name);
    if (!match) {
      throw new ConfigurationError(
        `Unknown source "${name}" in SOURCE_PRIORITY (expected one of ${SOURCE_NAMES.join(", ")})`,
      );
    }
    return match;
  });
}

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the service can start with zero
 * configuration for local development.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`, {
      cause: parsed.error,
    });
  }
  const e = parsed.data;

  if (e.SEARCH_DEFAULT_LIMIT > e.SEARCH_MAX_LIMIT) {
    throw new ConfigurationError("SEARCH_DEFAULT_LIMIT must not exceed SEARCH_MAX_LIMIT");
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    sourcesFile: e.SOURCES_FILE,
    sourcePriority: parseSourcePriority(e.SOURCE_PRIORITY),

    search: {
      perSourceLimit: e.SEARCH_PER_SOURCE_LIMIT,
      sufficientCount: e.SEARCH_SUFFICIENT_COUNT,
      perCallTimeoutMs: e.SEARCH_PER_CALL_TIMEOUT_MS,
      passTimeoutMs: e.SEARCH_PASS_TIMEOUT_MS,
      maxConcurrency: e.SEARCH_MAX_CONCURRENCY,
      maxRetries: e.SEARCH_MAX_RETRIES,
      retryBaseDelayMs: e.SEARCH_RETRY_BASE_DELAY_MS,
      maxCrossReferenceLookups: e.SEARCH_MAX_CROSS_REFERENCE_LOOKUPS,
      defaultResultLimit: e.SEARCH_DEFAULT_LIMIT,
      maxResultLimit: e.SEARCH_MAX_LIMIT,
      defaultRegion: e.SEARCH_DEFAULT_REGION,
    },

    cache: {
      enabled: e.CACHE_ENABLED,
      maxEntries: e.CACHE_MAX_ENTRIES,
      cacheTtlSeconds: e.CACHE_TTL_SECONDS,
      sweepIntervalMs: e.CACHE_SWEEP_INTERVAL_MS,
      suggestionTtlSeconds: e.SUGGESTION_TTL_SECONDS,
    },

    metrics: {
      enabled: e.METRICS_ENABLED,
      reportIntervalMs: e.METRICS_REPORT_INTERVAL_MS,
    },

    store: {
      databaseUrl: e.DATABASE_URL ?? null,
      staleAfterSeconds: e.STORE_STALE_AFTER_SECONDS,
      janitorIntervalMs: e.STORE_JANITOR_INTERVAL_MS,
    },
  };
}
