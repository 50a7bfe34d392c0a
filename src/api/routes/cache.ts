// ---------------------------------------------------------------------------
// Cache administration routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";

import type { SnapshotCache } from "../../cache/snapshot-cache.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";
import { identifierKey, parseIdentifier } from "../../domain/identifier/identifier.js";
import type { AppEnv } from "../env.js";

export interface CacheRouteDeps {
  cache: SnapshotCache;
  metricsCollector: MetricsCollector;
}

/**
 * - `GET /cache/metrics`              -- Hit/miss/eviction counters.
 * - `DELETE /cache`                   -- Drop every entry.
 * - `DELETE /cache/identifiers/:id`   -- Drop entries referencing a book.
 */
export function cacheRoutes(deps: CacheRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/metrics", (c) => {
    return c.json({ entries: deps.cache.size, ...deps.metricsCollector.cacheStats() });
  });

  app.delete("/", (c) => {
    const removed = deps.cache.invalidateAll();
    return c.json({ removed });
  });

  // Unclassifiable ids throw InvalidIdentifierError -> 400.
  app.delete("/identifiers/:id", (c) => {
    const id = parseIdentifier(c.req.param("id"));
    const removed = deps.cache.invalidateByIdentifier(id);
    return c.json({ identifier: identifierKey(id), removed });
  });

  return app;
}
