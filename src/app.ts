// ---------------------------------------------------------------------------
// Audiobook locator -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import { SourceName } from "./core/types.js";
import type {
  AppConfig,
  AudiobookStore,
  CatalogSource,
  SourceDefinition,
  SuggestionProvider,
} from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { loadSourceDefinitions, resolveApiKey } from "./config/source-definitions.js";
import { createLogger, moduleLogger } from "./logging/logger.js";
import { HealthTracker } from "./cache/health-tracker.js";
import { SnapshotCache } from "./cache/snapshot-cache.js";
import { MetricsCollector } from "./metrics/metrics-collector.js";
import { SourceRegistry } from "./core/source-registry.js";
import { ConcurrencyPool } from "./orchestrator/concurrency.js";
import { SearchAggregator } from "./orchestrator/search-aggregator.js";
import { MergeEngine } from "./orchestrator/merge-engine.js";
import { SearchCoordinator } from "./orchestrator/search-coordinator.js";
import { SuggestionService } from "./orchestrator/suggestion-service.js";
import { InMemoryAudiobookStore } from "./store/memory-store.js";
import { PgAudiobookStore, createPool, initSchema } from "./store/pg-store.js";
import { StoreJanitor } from "./store/janitor.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

// ── Source imports ─────────────────────────────────────────────────────────
import { AudibleSource } from "./sources/audible/audible-source.js";
import { GoogleBooksSource } from "./sources/google-books/google-books-source.js";
import { OpenLibrarySource } from "./sources/openlibrary/openlibrary-source.js";

// ── Source factory ─────────────────────────────────────────────────────────

export function createSource(
  definition: SourceDefinition,
  logger: pino.Logger,
  env: NodeJS.ProcessEnv = process.env,
): CatalogSource & Partial<SuggestionProvider> {
  switch (definition.name) {
    case SourceName.AUDIBLE:
      return new AudibleSource(definition, logger);
    case SourceName.GOOGLE_BOOKS:
      return new GoogleBooksSource(definition, logger, resolveApiKey(definition, env));
    case SourceName.OPEN_LIBRARY:
      return new OpenLibrarySource(definition, logger);
  }
}

function isSuggestionProvider(
  source: CatalogSource & Partial<SuggestionProvider>,
): source is CatalogSource & SuggestionProvider {
  return typeof source.suggest === "function";
}

// ── Main ───────────────────────────────────────────────────────────────────

export interface BuildOptions {
  config?: AppConfig;
  /** Source definitions; read from `config.sourcesFile` when omitted. */
  definitions?: SourceDefinition[];
  /** Overrides the store selected by `config.store.databaseUrl`. */
  store?: AudiobookStore;
  logger?: pino.Logger;
}

export interface AppHandle {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: pino.Logger;
  /** Stops timers and closes the database pool. */
  dispose(): Promise<void>;
}

export async function buildApp(options: BuildOptions = {}): Promise<AppHandle> {
  // 1. Load configuration
  const config = options.config ?? loadConfig();

  // 2. Create logger
  const logger =
    options.logger ??
    createLogger({
      level: config.logLevel,
      prettyPrint: config.env === "development",
      redactSecrets: true,
    });

  // 3. Load source definitions and build sources
  const definitions = options.definitions ?? loadSourceDefinitions(config.sourcesFile);
  const enabled = definitions.filter((d) => d.enabled);
  const sources = enabled.map((d) => createSource(d, logger));
  const priority =
    config.sourcePriority.length > 0 ? config.sourcePriority : enabled.map((d) => d.name);
  const registry = new SourceRegistry(sources, priority);
  logger.info({ sources: registry.priority }, "catalog sources loaded");

  // 4. Store
  const closers: Array<() => Promise<void>> = [];
  let store: AudiobookStore;
  if (options.store) {
    store = options.store;
  } else if (config.store.databaseUrl) {
    const pool = createPool(config.store.databaseUrl, moduleLogger(logger, "store"));
    await initSchema(pool);
    closers.push(() => pool.end());
    store = new PgAudiobookStore(pool);
  } else {
    store = new InMemoryAudiobookStore();
  }

  // 5. Infrastructure services
  const healthTracker = new HealthTracker();
  const metricsCollector = new MetricsCollector(config.metrics, moduleLogger(logger, "metrics"));
  const cache = new SnapshotCache(
    store,
    metricsCollector,
    config.cache,
    moduleLogger(logger, "cache"),
  );
  const janitor = new StoreJanitor(store, cache, config.store, moduleLogger(logger, "janitor"));
  janitor.start();

  // 6. Search pipeline
  const aggregator = new SearchAggregator(
    registry,
    new ConcurrencyPool(config.search.maxConcurrency),
    healthTracker,
    metricsCollector,
    {
      perCallTimeoutMs: config.search.perCallTimeoutMs,
      passTimeoutMs: config.search.passTimeoutMs,
      maxRetries: config.search.maxRetries,
      retryBaseDelayMs: config.search.retryBaseDelayMs,
    },
    moduleLogger(logger, "aggregator"),
  );
  const mergeEngine = new MergeEngine(registry.priority, moduleLogger(logger, "merge"));
  const searchCoordinator = new SearchCoordinator(
    aggregator,
    mergeEngine,
    cache,
    store,
    metricsCollector,
    config.search,
    moduleLogger(logger, "coordinator"),
  );

  const primary = sources.find((s) => s.name === registry.primary.name);
  const suggestionService = new SuggestionService(
    primary && isSuggestionProvider(primary) ? primary : null,
    config.cache,
    moduleLogger(logger, "suggestions"),
  );

  // 7. Create Hono app
  const app = createApp({
    searchCoordinator,
    suggestionService,
    cache,
    registry,
    healthTracker,
    metricsCollector,
    logger,
    defaultRegion: config.search.defaultRegion,
    maxResultLimit: config.search.maxResultLimit,
    // The pass deadline plus room for cross-referencing.
    requestTimeoutMs: config.search.passTimeoutMs + 2 * config.search.perCallTimeoutMs,
  });

  logger.info(
    {
      port: config.port,
      env: config.env,
      store: store instanceof InMemoryAudiobookStore ? "memory" : "postgres",
      cacheEnabled: config.cache.enabled,
    },
    "audiobook-locator ready",
  );

  return {
    app,
    config,
    logger,
    async dispose() {
      janitor.stop();
      cache.dispose();
      metricsCollector.dispose();
      for (const close of closers) await close();
    },
  };
}
