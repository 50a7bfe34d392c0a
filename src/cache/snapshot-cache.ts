// ---------------------------------------------------------------------------
// Result cache of detached snapshots, re-resolved against the store on read.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  AudiobookStore,
  CacheConfig,
  CanonicalRecord,
  Identifier,
  IdentifierKey,
  RecordSnapshot,
  StoredAudiobook,
} from "../core/types.js";
import { StaleReferenceError } from "../core/errors.js";
import { equivalentIdentifiers, identifierKey } from "../domain/identifier/identifier.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import { MemoryCache } from "./memory-cache.js";
import { snapshotReferences, toSnapshot } from "./snapshot.js";

interface SnapshotEntry {
  snapshots: readonly RecordSnapshot[];
  createdAt: string;
}

/**
 * Caches final result lists as immutable snapshots only. A hit never
 * returns the cached objects: every snapshot is looked up again through
 * {@link AudiobookStore.fetchByIdentifierSet}, and the ones that no longer
 * resolve are dropped from the answer.
 */
export class SnapshotCache {
  private readonly entries: MemoryCache<SnapshotEntry>;
  private readonly ttlMs: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly store: AudiobookStore,
    private readonly metrics: MetricsCollector,
    private readonly config: CacheConfig,
    private readonly logger: pino.Logger,
  ) {
    this.entries = new MemoryCache<SnapshotEntry>(config.maxEntries, {
      onEvict: (key, _entry, reason) => {
        this.metrics.recordCacheEvictions(1);
        this.logger.debug({ key, reason }, "cache entry evicted");
      },
    });
    this.ttlMs = config.cacheTtlSeconds * 1000;

    if (config.enabled && config.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweep();
      }, config.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /**
   * Live records for `key`, in cached order, or `null` on a miss. Store
   * errors other than {@link StaleReferenceError} propagate.
   */
  async get(key: string): Promise<StoredAudiobook[] | null> {
    if (!this.config.enabled) return null;

    const entry = this.entries.get(key);
    if (!entry) {
      this.metrics.recordCacheMiss();
      this.logger.debug({ key }, "cache miss");
      return null;
    }

    if (entry.snapshots.length === 0) {
      this.metrics.recordCacheHit();
      return [];
    }

    let resolved: Map<IdentifierKey, StoredAudiobook>;
    try {
      resolved = await this.store.fetchByIdentifierSet(entry.snapshots.map((s) => s.lookup));
    } catch (err: unknown) {
      if (!(err instanceof StaleReferenceError)) throw err;
      this.metrics.recordStaleReferenceError();
      this.metrics.recordCacheMiss();
      this.entries.delete(key);
      this.logger.error({ key, err }, "stale reference while rehydrating cache entry");
      return null;
    }

    const live: StoredAudiobook[] = [];
    const seen = new Set<string>();
    let failures = 0;
    for (const snapshot of entry.snapshots) {
      const row = resolved.get(identifierKey(snapshot.lookup));
      if (!row) {
        failures++;
        continue;
      }
      if (seen.has(row.id)) continue;
      seen.add(row.id);
      live.push(row);
    }

    if (failures > 0) {
      this.metrics.recordRehydrationFailures(failures);
      this.logger.info(
        { key, failures, cached: entry.snapshots.length },
        "cached records no longer in store",
      );
    }

    if (live.length === 0) {
      this.entries.delete(key);
      this.metrics.recordCacheMiss();
      return null;
    }

    this.metrics.recordCacheHit();
    this.logger.debug({ key, results: live.length }, "cache hit");
    return live;
  }

  /**
   * Snapshot and store `records`. Records without any identifier are left
   * out, since they could never be re-resolved. Returns the snapshot count.
   */
  put(key: string, records: readonly CanonicalRecord[], ttlSeconds?: number): number {
    if (!this.config.enabled) return 0;

    const snapshots: RecordSnapshot[] = [];
    for (const record of records) {
      const snapshot = toSnapshot(record);
      if (snapshot) snapshots.push(snapshot);
    }

    const ttlMs = ttlSeconds === undefined ? this.ttlMs : ttlSeconds * 1000;
    this.entries.set(
      key,
      { snapshots: Object.freeze(snapshots), createdAt: new Date().toISOString() },
      ttlMs,
    );
    this.logger.debug({ key, snapshots: snapshots.length }, "cache set");
    return snapshots.length;
  }

  invalidate(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) this.logger.debug({ key }, "cache invalidated");
    return removed;
  }

  /**
   * Drop every entry referencing `id`. ISBN-10 and ISBN-13 forms of the
   * same book count as the same identifier.
   */
  invalidateByIdentifier(id: Identifier): number {
    const keys = new Set<string>(equivalentIdentifiers(id).map((form) => identifierKey(form)));
    const removed = this.entries.deleteWhere((entry) =>
      entry.snapshots.some((snapshot) => snapshotReferences(snapshot, keys)),
    );
    if (removed > 0) {
      this.logger.info({ identifier: identifierKey(id), removed }, "cache entries invalidated");
    }
    return removed;
  }

  invalidateAll(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.logger.info({ removed }, "cache cleared");
    return removed;
  }

  /** Remove expired entries now rather than on next access. */
  sweep(): number {
    return this.entries.sweepExpired();
  }

  get size(): number {
    return this.entries.size;
  }

  dispose(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
