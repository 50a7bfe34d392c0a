// ---------------------------------------------------------------------------
// In-memory metrics for source calls, search passes and the result cache.
// ---------------------------------------------------------------------------

import type { MetricsConfig, SourceName } from "../core/types.js";
import type pino from "pino";

// ── Per-source metrics ──────────────────────────────────────────────────────

interface SourceMetrics {
  source: string;
  operation: string;
  totalRequests: number;
  successCount: number;
  failureCount: number;
  timeoutCount: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

// ── Search-level metrics ────────────────────────────────────────────────────

interface SearchMetrics {
  totalSearches: number;
  completedSearches: number;
  cancelledSearches: number;
  failedSearches: number;
  /** Passes where every source call failed. */
  allSourcesFailed: number;
  shortCircuited: number;
  directLookups: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

// ── Cache metrics ───────────────────────────────────────────────────────────

interface CacheMetrics {
  hits: number;
  misses: number;
  evictions: number;
  /** Snapshots that no longer resolved against the store on a hit. */
  rehydrationFailures: number;
  /** Stale-reference errors raised by the store. Stays zero when healthy. */
  staleReferenceErrors: number;
}

export interface CacheStats extends CacheMetrics {
  hitRate: number;
}

export type SourceCallOutcome = "success" | "failure" | "timeout";

export type SearchOutcome = "completed" | "cancelled" | "failed";

export interface SearchRecord {
  outcome: SearchOutcome;
  durationMs: number;
  fromCache: boolean;
  allSourcesFailed?: boolean;
  shortCircuited?: boolean;
  directLookup?: boolean;
}

/** Immutable snapshot of all metrics at a point in time. */
export interface MetricsSnapshot {
  sources: ReadonlyMap<string, Readonly<SourceMetrics>>;
  search: Readonly<SearchMetrics>;
  cache: Readonly<CacheStats>;
  collectedAt: string;
}

/**
 * Collects in-memory metrics. Optionally logs a periodic report.
 */
export class MetricsCollector {
  private readonly sourceMetrics = new Map<string, SourceMetrics>();
  private readonly searchMetrics: SearchMetrics = {
    totalSearches: 0,
    completedSearches: 0,
    cancelledSearches: 0,
    failedSearches: 0,
    allSourcesFailed: 0,
    shortCircuited: 0,
    directLookups: 0,
    totalDurationMs: 0,
    minDurationMs: Infinity,
    maxDurationMs: 0,
  };
  private readonly cacheMetrics: CacheMetrics = {
    hits: 0,
    misses: 0,
    evictions: 0,
    rehydrationFailures: 0,
    staleReferenceErrors: 0,
  };

  private reportTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly config: MetricsConfig,
    private readonly logger?: pino.Logger,
  ) {
    if (config.enabled && config.reportIntervalMs > 0 && logger) {
      this.reportTimer = setInterval(() => {
        this.logReport();
      }, config.reportIntervalMs);

      // Allow the process to exit even if the timer is still running.
      this.reportTimer.unref();
    }
  }

  // ── Source metrics ──────────────────────────────────────────────────────

  recordSourceCall(
    source: SourceName,
    operation: "search" | "lookup",
    outcome: SourceCallOutcome,
    durationMs: number,
  ): void {
    if (!this.config.enabled) return;

    const key = `${source}:${operation}`;
    let m = this.sourceMetrics.get(key);

    if (!m) {
      m = {
        source,
        operation,
        totalRequests: 0,
        successCount: 0,
        failureCount: 0,
        timeoutCount: 0,
        totalDurationMs: 0,
        minDurationMs: Infinity,
        maxDurationMs: 0,
      };
      this.sourceMetrics.set(key, m);
    }

    m.totalRequests++;
    m.totalDurationMs += durationMs;

    if (durationMs < m.minDurationMs) m.minDurationMs = durationMs;
    if (durationMs > m.maxDurationMs) m.maxDurationMs = durationMs;

    switch (outcome) {
      case "success":
        m.successCount++;
        break;
      case "failure":
        m.failureCount++;
        break;
      case "timeout":
        m.timeoutCount++;
        break;
    }
  }

  // ── Search metrics ──────────────────────────────────────────────────────

  recordSearch(record: SearchRecord): void {
    if (!this.config.enabled) return;

    const s = this.searchMetrics;
    s.totalSearches++;
    s.totalDurationMs += record.durationMs;

    if (record.durationMs < s.minDurationMs) s.minDurationMs = record.durationMs;
    if (record.durationMs > s.maxDurationMs) s.maxDurationMs = record.durationMs;

    switch (record.outcome) {
      case "completed":
        s.completedSearches++;
        break;
      case "cancelled":
        s.cancelledSearches++;
        break;
      case "failed":
        s.failedSearches++;
        break;
    }

    if (record.allSourcesFailed) s.allSourcesFailed++;
    if (record.shortCircuited) s.shortCircuited++;
    if (record.directLookup) s.directLookups++;
  }

  // ── Cache metrics ───────────────────────────────────────────────────────
  // Always counted: the cache reports these through its own endpoint.

  recordCacheHit(): void {
    this.cacheMetrics.hits++;
  }

  recordCacheMiss(): void {
    this.cacheMetrics.misses++;
  }

  recordCacheEvictions(count: number): void {
    this.cacheMetrics.evictions += count;
  }

  recordRehydrationFailures(count: number): void {
    this.cacheMetrics.rehydrationFailures += count;
  }

  recordStaleReferenceError(): void {
    this.cacheMetrics.staleReferenceErrors++;
  }

  cacheStats(): CacheStats {
    const c = this.cacheMetrics;
    const lookups = c.hits + c.misses;
    return {
      ...c,
      hitRate: lookups === 0 ? 0 : c.hits / lookups,
    };
  }

  // ── Snapshot ────────────────────────────────────────────────────────────

  snapshot(): MetricsSnapshot {
    const sourcesCopy = new Map<string, SourceMetrics>();
    for (const [key, value] of this.sourceMetrics) {
      sourcesCopy.set(key, { ...value });
    }

    return {
      sources: sourcesCopy,
      search: { ...this.searchMetrics },
      cache: this.cacheStats(),
      collectedAt: new Date().toISOString(),
    };
  }

  // ── Periodic report ─────────────────────────────────────────────────────

  private logReport(): void {
    if (!this.logger) return;

    const snap = this.snapshot();
    this.logger.info(
      {
        metrics: {
          sources: Object.fromEntries(snap.sources),
          search: snap.search,
          cache: snap.cache,
        },
      },
      "periodic metrics report",
    );
  }

  // ── Cleanup ─────────────────────────────────────────────────────────────

  dispose(): void {
    if (this.reportTimer !== null) {
      clearInterval(this.reportTimer);
      this.reportTimer = null;
    }
  }
}
