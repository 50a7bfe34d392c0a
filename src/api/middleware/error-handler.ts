// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import {
  InvalidIdentifierError,
  RequestValidationError,
  SearchCancelledError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/**
 * Hono `onError` handler.
 *
 * - `InvalidIdentifierError`  -> 400
 * - `RequestValidationError`  -> 400, with the individual issues
 * - `SearchCancelledError`    -> 503
 * - Everything else           -> 500
 *
 * In production only the 400 messages, which echo caller input, are passed
 * through; everything else gets a generic message.
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const isProduction = process.env["NODE_ENV"] === "production";

  if (err instanceof InvalidIdentifierError) {
    return c.json({ error: err.message, type: "invalid_identifier" }, 400);
  }

  if (err instanceof RequestValidationError) {
    return c.json({ error: err.message, type: "validation_error", issues: err.issues }, 400);
  }

  if (err instanceof SearchCancelledError) {
    return c.json(
      { error: isProduction ? "Search was cancelled" : err.message, type: "search_cancelled" },
      503,
    );
  }

  c.get("logger")?.error({ err }, "unhandled error");

  // Default: 500 -- NEVER leak internal error details in production.
  const message = isProduction ? "Internal server error" : err.message;
  return c.json({ error: message, type: "internal_error" }, 500);
}
