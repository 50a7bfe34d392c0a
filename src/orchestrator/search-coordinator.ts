// ---------------------------------------------------------------------------
// Search coordinator: cache, aggregation, merge, ranking and persistence for
// one search request.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  AudiobookStore,
  CanonicalRecord,
  Region,
  SearchConfig,
  SearchRequest,
  SearchResponse,
  SourceFailure,
  StoredAudiobook,
} from "../core/types.js";
import { SearchCancelledError, StaleReferenceError } from "../core/errors.js";
import type { SnapshotCache } from "../cache/snapshot-cache.js";
import { lookupIdentifierFor } from "../cache/snapshot.js";
import { normalizeQuery } from "../domain/query/query-expander.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import type { MergeEngine } from "./merge-engine.js";
import { rankRecords } from "./result-ranker.js";
import type { SearchAggregator } from "./search-aggregator.js";

/** Cache key for a search: region, result limit and case-folded query. */
export function searchCacheKey(normalizedQuery: string, region: Region, limit: number): string {
  return `${region}|${limit}|${normalizedQuery.toLowerCase()}`;
}

// ── SearchCoordinator ──────────────────────────────────────────────────────

/**
 * Runs the full pipeline for one request:
 *
 * 1. Normalise the query and look in the snapshot cache.
 * 2. Run the aggregation pass, then cross-reference secondary ISBNs against
 *    the primary catalog.
 * 3. Merge, rank and truncate.
 * 4. Upsert the ranked records into the store; callers only ever receive
 *    store-backed records.
 * 5. Cache snapshots, unless the pass was cut short or nothing answered.
 */
export class SearchCoordinator {
  constructor(
    private readonly aggregator: SearchAggregator,
    private readonly mergeEngine: MergeEngine,
    private readonly cache: SnapshotCache,
    private readonly store: AudiobookStore,
    private readonly metrics: MetricsCollector,
    private readonly config: SearchConfig,
    private readonly logger: pino.Logger,
  ) {}

  async search(request: SearchRequest): Promise<SearchResponse> {
    const searchId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const startMs = Date.now();

    const normalizedQuery = normalizeQuery(request.query);
    const region = request.region ?? this.config.defaultRegion;
    const limit = this.clampLimit(request.limit);
    const log = this.logger.child({ searchId, query: normalizedQuery, region });

    const respond = (
      results: StoredAudiobook[],
      fields: Partial<Pick<SearchResponse,
        | "fromCache"
        | "directLookup"
        | "variantsIssued"
        | "shortCircuited"
        | "failures"
        | "isPartial"
        | "skippedWithoutIdentifier"
      >>,
    ): SearchResponse => ({
      searchId,
      query: request.query,
      normalizedQuery,
      region,
      limit,
      results,
      fromCache: fields.fromCache ?? false,
      directLookup: fields.directLookup ?? false,
      variantsIssued: fields.variantsIssued ?? 0,
      shortCircuited: fields.shortCircuited ?? false,
      failures: fields.failures ?? [],
      isPartial: fields.isPartial ?? false,
      skippedWithoutIdentifier: fields.skippedWithoutIdentifier ?? 0,
      startedAt,
      completedAt: new Date().toISOString(),
    });

    if (normalizedQuery.length === 0) return respond([], {});

    // 1. Cache
    const key = searchCacheKey(normalizedQuery, region, limit);
    const cached = await this.cache.get(key);
    if (cached) {
      this.metrics.recordSearch({
        outcome: "completed",
        durationMs: Date.now() - startMs,
        fromCache: true,
      });
      log.debug({ results: cached.length }, "served from cache");
      return respond(cached, { fromCache: true });
    }

    try {
      // 2. Aggregate + cross-reference
      const aggregation = await this.aggregator.search(normalizedQuery, {
        perSourceLimit: this.config.perSourceLimit,
        sufficientCount: this.config.sufficientCount,
        region,
        signal: request.signal,
      });

      const failures: SourceFailure[] = [...aggregation.failures];
      const candidates = aggregation.directLookup
        ? aggregation.candidates
        : await this.mergeEngine.crossReference(
            aggregation.candidates,
            (id) =>
              this.aggregator.lookupByIdentifier(id, {
                region,
                signal: request.signal,
                failures,
              }),
            { maxLookups: this.config.maxCrossReferenceLookups },
          );

      if (request.signal?.aborted) {
        throw new SearchCancelledError(normalizedQuery, { cause: request.signal.reason });
      }

      // 3. Merge + rank. Records with no identifier cannot be stored.
      const records = this.mergeEngine.merge(candidates);
      const storable = records.filter((r) => lookupIdentifierFor(r) !== null);
      const skippedWithoutIdentifier = records.length - storable.length;
      if (skippedWithoutIdentifier > 0) {
        log.debug({ skipped: skippedWithoutIdentifier }, "records without identifiers left out");
      }
      const ranked = rankRecords(storable, limit);

      // 4. Persist
      const persisted = await Promise.all(ranked.map((r) => this.persist(r, log)));
      const results = dedupeById(persisted.filter((row): row is StoredAudiobook => row !== null));
      const lostOnWrite = persisted.length - persisted.filter((row) => row !== null).length;

      // 5. Cache
      const allSourcesFailed =
        aggregation.callsAttempted > 0 &&
        aggregation.failures.length >= aggregation.callsAttempted;
      const isPartial = failures.length > 0 || aggregation.deadlineExceeded;

      if (allSourcesFailed) {
        log.warn(
          { failures: failures.map((f) => ({ source: f.source, input: f.input, kind: f.kind })) },
          "every source call failed; empty result is not a genuine miss",
        );
      } else if (aggregation.deadlineExceeded) {
        log.warn({ variantsIssued: aggregation.variantsIssued }, "search pass hit its deadline");
      } else if (lostOnWrite > 0) {
        log.warn({ lostOnWrite }, "records lost to concurrent deletes; result not cached");
      } else {
        this.cache.put(key, ranked);
      }

      const durationMs = Date.now() - startMs;
      this.metrics.recordSearch({
        outcome: "completed",
        durationMs,
        fromCache: false,
        allSourcesFailed,
        shortCircuited: aggregation.shortCircuited,
        directLookup: aggregation.directLookup,
      });

      log.info(
        {
          durationMs,
          candidates: candidates.length,
          merged: records.length,
          results: results.length,
          variantsIssued: aggregation.variantsIssued,
          shortCircuited: aggregation.shortCircuited,
          directLookup: aggregation.directLookup,
          failures: failures.length,
        },
        "search completed",
      );

      return respond(results, {
        directLookup: aggregation.directLookup,
        variantsIssued: aggregation.variantsIssued,
        shortCircuited: aggregation.shortCircuited,
        failures,
        isPartial,
        skippedWithoutIdentifier,
      });
    } catch (err: unknown) {
      const cancelled = err instanceof SearchCancelledError;
      this.metrics.recordSearch({
        outcome: cancelled ? "cancelled" : "failed",
        durationMs: Date.now() - startMs,
        fromCache: false,
      });
      if (cancelled) log.info("search cancelled by caller");
      else log.error({ err }, "search failed");
      throw err;
    }
  }

  /**
   * Upsert one record, retrying once when the store reports that the row
   * it matched was deleted underneath it. `null` when both attempts lose.
   */
  private async persist(
    record: CanonicalRecord,
    log: pino.Logger,
  ): Promise<StoredAudiobook | null> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        return await this.store.upsert(record);
      } catch (err: unknown) {
        if (!(err instanceof StaleReferenceError)) throw err;
        this.metrics.recordStaleReferenceError();
        log.warn({ err, title: record.title, attempt }, "stale reference while persisting record");
      }
    }
    return null;
  }

  private clampLimit(requested: number | undefined): number {
    const limit = requested ?? this.config.defaultResultLimit;
    return Math.min(Math.max(1, Math.floor(limit)), this.config.maxResultLimit);
  }
}

function dedupeById(rows: StoredAudiobook[]): StoredAudiobook[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    if (seen.has(row.id)) return false;
    seen.add(row.id);
    return true;
  });
}
