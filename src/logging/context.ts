// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { Logger } from "./logger.js";
import type { AppEnv } from "../api/env.js";

/**
 * Attach a child logger carrying `requestId`, `method` and `path` to every
 * request. Handlers read it via `c.get("logger")`. The completion line is
 * logged at `warn` for 4xx and `error` for 5xx.
 *
 * Must run after the request-id middleware so the id is already on the
 * context.
 */
export function createRequestLogger(
  baseLogger: Logger,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.debug("request started");

    await next();

    const durationMs = Date.now() - start;
    const status = c.res.status;
    const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";
    childLogger[level]({ durationMs, status }, "request completed");
  };
}
