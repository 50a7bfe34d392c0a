// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { HealthTracker } from "../../cache/health-tracker.js";
import type { SourceRegistry } from "../../core/source-registry.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  healthTracker: HealthTracker;
  registry: SourceRegistry;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`         -- Basic liveness probe.
 * - `GET /health/sources` -- Per-source call health, in priority order.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    return c.json({
      status: "ok",
      uptime: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/sources
  app.get("/sources", (c) => {
    const sources = deps.registry.priority.map((name) => ({
      name,
      primary: name === deps.registry.primary.name,
      successRate: deps.healthTracker.getSuccessRate(name),
      health: deps.healthTracker.getSourceHealth(name),
    }));
    return c.json({ sources });
  });

  return app;
}
