// ---------------------------------------------------------------------------
// Generic in-memory LRU cache with per-entry TTL.
// ---------------------------------------------------------------------------

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/** Default time-to-live: 1 hour. */
const DEFAULT_TTL_MS = 3_600_000;

export type EvictionReason = "capacity" | "expired";

export interface MemoryCacheOptions<T> {
  /** Called when an entry leaves the cache without an explicit delete. */
  onEvict?: (key: string, value: T, reason: EvictionReason) => void;
}

/**
 * A generic LRU (Least Recently Used) cache with per-entry TTL support.
 *
 * Backed by a `Map` which preserves insertion order.
 * - On `get`, the entry is moved to the end (most recently used).
 * - On `set`, if at capacity the *first* entry (least recently used) is evicted.
 * - Expired entries are removed lazily on `get`, or eagerly by `sweepExpired`.
 */
export class MemoryCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly onEvict: MemoryCacheOptions<T>["onEvict"];

  constructor(maxEntries: number, options: MemoryCacheOptions<T> = {}) {
    if (maxEntries < 1) {
      throw new RangeError("maxEntries must be at least 1");
    }
    this.maxEntries = maxEntries;
    this.onEvict = options.onEvict;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);

    if (!entry) {
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      this.onEvict?.(key, entry.value, "expired");
      return null;
    }

    // Promote to most recently used: delete + re-insert at end
    this.store.delete(key);
    this.store.set(key, entry);

    return entry.value;
  }

  set(key: string, value: T, ttlMs: number = DEFAULT_TTL_MS): void {
    if (this.store.has(key)) {
      this.store.delete(key);
    } else if (this.store.size >= this.maxEntries) {
      const oldest = this.store.entries().next();
      if (!oldest.done) {
        const [oldestKey, oldestEntry] = oldest.value;
        this.store.delete(oldestKey);
        this.onEvict?.(oldestKey, oldestEntry.value, "capacity");
      }
    }

    this.store.set(key, {
      value,
      expiresAt: Date.now() + ttlMs,
    });
  }

  /** Returns whether the key was present. */
  delete(key: string): boolean {
    return this.store.delete(key);
  }

  /** Delete every live entry matching the predicate; returns how many went. */
  deleteWhere(predicate: (value: T, key: string) => boolean): number {
    let removed = 0;
    for (const [key, entry] of [...this.store]) {
      if (predicate(entry.value, key)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Drop every expired entry; returns how many were dropped. */
  sweepExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of [...this.store]) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
        this.onEvict?.(key, entry.value, "expired");
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
