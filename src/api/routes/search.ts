// ---------------------------------------------------------------------------
// Search routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import { Region } from "../../core/types.js";
import { RequestValidationError } from "../../core/errors.js";
import type { SearchCoordinator } from "../../orchestrator/search-coordinator.js";
import type { SuggestionService } from "../../orchestrator/suggestion-service.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by search routes. */
export interface SearchRouteDeps {
  searchCoordinator: SearchCoordinator;
  suggestionService: SuggestionService;
  defaultRegion: Region;
  maxResultLimit: number;
  /** Upper bound on one request's search pass before it is abandoned. */
  requestTimeoutMs: number;
}

const MAX_QUERY_LENGTH = 256;

const RegionSchema = z.nativeEnum(Region);

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "query"}: ${i.message}`);
}

/**
 * Mounts search endpoints:
 *
 * - `GET /search?q=&limit=&region=`     -- Aggregated, merged search.
 * - `GET /search/suggestions?q=&region=` -- Type-ahead titles.
 */
export function searchRoutes(deps: SearchRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  const SearchQuerySchema = z.object({
    q: z.string().trim().min(1, "q is required").max(MAX_QUERY_LENGTH),
    limit: z.coerce.number().int().min(1).max(deps.maxResultLimit).optional(),
    region: RegionSchema.optional(),
  });

  const SuggestQuerySchema = z.object({
    q: z.string().trim().max(MAX_QUERY_LENGTH).default(""),
    region: RegionSchema.optional(),
  });

  // GET /search
  app.get("/", async (c) => {
    const parsed = SearchQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      throw new RequestValidationError(issuesOf(parsed.error));
    }

    // Abandon the pass if the client goes away or the request runs too long.
    const signal = AbortSignal.any([c.req.raw.signal, AbortSignal.timeout(deps.requestTimeoutMs)]);

    const result = await deps.searchCoordinator.search({
      query: parsed.data.q,
      limit: parsed.data.limit,
      region: parsed.data.region ?? deps.defaultRegion,
      signal,
    });

    c.get("logger").info(
      {
        searchId: result.searchId,
        results: result.results.length,
        fromCache: result.fromCache,
        failures: result.failures.length,
      },
      "search request served",
    );

    return c.json(result);
  });

  // GET /search/suggestions
  app.get("/suggestions", async (c) => {
    const parsed = SuggestQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      throw new RequestValidationError(issuesOf(parsed.error));
    }

    const region = parsed.data.region ?? deps.defaultRegion;
    const suggestions = await deps.suggestionService.suggest(
      parsed.data.q,
      region,
      c.req.raw.signal,
    );
    return c.json({ query: parsed.data.q, region, suggestions });
  });

  return app;
}
