// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

/** UUIDs or short alphanumeric ids; anything else is replaced. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Tags every request with an id, stored on the context as `requestId` and
 * echoed in the `X-Request-ID` response header. A well-formed incoming
 * `X-Request-ID` is reused; anything else (newlines, control characters,
 * oversized values) is replaced by a fresh UUID so it cannot reach the logs.
 */
export function requestIdMiddleware(): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing) ? existing : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
