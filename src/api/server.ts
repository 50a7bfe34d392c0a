// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";

import type { Region } from "../core/types.js";
import type { SourceRegistry } from "../core/source-registry.js";
import type { SearchCoordinator } from "../orchestrator/search-coordinator.js";
import type { SuggestionService } from "../orchestrator/suggestion-service.js";
import type { SnapshotCache } from "../cache/snapshot-cache.js";
import type { HealthTracker } from "../cache/health-tracker.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { errorHandler } from "./middleware/error-handler.js";

import { searchRoutes } from "./routes/search.js";
import { cacheRoutes } from "./routes/cache.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  searchCoordinator: SearchCoordinator;
  suggestionService: SuggestionService;
  cache: SnapshotCache;
  registry: SourceRegistry;
  healthTracker: HealthTracker;
  metricsCollector: MetricsCollector;
  logger: pino.Logger;
  defaultRegion: Region;
  maxResultLimit: number;
  requestTimeoutMs: number;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      service: "audiobook-locator",
      routes: ["/health", "/health/sources", "/search", "/search/suggestions", "/cache/metrics"],
    }),
  );

  app.route(
    "/search",
    searchRoutes({
      searchCoordinator: deps.searchCoordinator,
      suggestionService: deps.suggestionService,
      defaultRegion: deps.defaultRegion,
      maxResultLimit: deps.maxResultLimit,
      requestTimeoutMs: deps.requestTimeoutMs,
    }),
  );

  app.route(
    "/cache",
    cacheRoutes({ cache: deps.cache, metricsCollector: deps.metricsCollector }),
  );

  app.route(
    "/health",
    healthRoutes({ healthTracker: deps.healthTracker, registry: deps.registry }),
  );

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));

  // ── Error handling ─────────────────────────────────────────────────────

  app.onError(errorHandler);

  return app;
}
