// ---------------------------------------------------------------------------
// Type-ahead title suggestions from the primary catalog.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { CacheConfig, Region, SuggestionProvider } from "../core/types.js";
import { MemoryCache } from "../cache/memory-cache.js";
import { normalizeQuery } from "../domain/query/query-expander.js";

/**
 * Caches suggestions per region and case-folded query. Upstream failures
 * are logged and answered with an empty list.
 */
export class SuggestionService {
  private readonly cache: MemoryCache<string[]>;
  private readonly ttlMs: number;

  constructor(
    private readonly provider: SuggestionProvider | null,
    config: CacheConfig,
    private readonly logger: pino.Logger,
  ) {
    this.cache = new MemoryCache<string[]>(config.maxEntries);
    this.ttlMs = config.suggestionTtlSeconds * 1000;
  }

  async suggest(query: string, region: Region, signal?: AbortSignal): Promise<string[]> {
    const normalized = normalizeQuery(query);
    if (normalized.length === 0 || !this.provider) return [];

    const key = `${region}|${normalized.toLowerCase()}`;
    const cached = this.cache.get(key);
    if (cached) return [...cached];

    try {
      const suggestions = await this.provider.suggest(normalized, { region, signal });
      this.cache.set(key, suggestions, this.ttlMs);
      return [...suggestions];
    } catch (err: unknown) {
      this.logger.warn({ err, query: normalized, region }, "suggestion lookup failed");
      return [];
    }
  }
}
