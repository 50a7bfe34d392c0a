// ---------------------------------------------------------------------------
// Tests for the store janitor.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, afterEach } from "vitest";

import { SnapshotCache } from "../../../src/cache/snapshot-cache.js";
import { InMemoryAudiobookStore } from "../../../src/store/memory-store.js";
import { StoreJanitor } from "../../../src/store/janitor.js";
import type { StoreConfig } from "../../../src/core/types.js";
import {
  cacheConfig,
  createMetrics,
  createTestLogger,
  makeRecord,
} from "../../helpers/fakes.js";

const DAY_MS = 86_400_000;
const T0 = Date.parse("2026-01-01T00:00:00.000Z");

const OLD = makeRecord({ primaryId: "B0000000AA", title: "Old" });
const FRESH = makeRecord({ isbn13: "9780306406157", isbn10: "0306406152", title: "Fresh" });

function setup(config: Partial<StoreConfig> = {}) {
  let clock = T0;
  const now = (): Date => new Date(clock);
  const logger = createTestLogger();
  const store = new InMemoryAudiobookStore(now);
  const cache = new SnapshotCache(store, createMetrics(), cacheConfig(), logger);
  const janitor = new StoreJanitor(
    store,
    cache,
    { databaseUrl: null, staleAfterSeconds: 2 * 86_400, janitorIntervalMs: 0, ...config },
    logger,
    now,
  );
  return {
    store,
    cache,
    janitor,
    advance: (ms: number): void => {
      clock += ms;
    },
  };
}

describe("StoreJanitor", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("prunes stale rows and drops cache entries that reference them", async () => {
    const { store, cache, janitor, advance } = setup();
    await store.upsert(OLD);
    advance(2 * DAY_MS);
    await store.upsert(FRESH);
    cache.put("old", [OLD]);
    cache.put("fresh", [FRESH]);
    cache.put("both", [FRESH, OLD]);
    advance(DAY_MS);

    const run = await janitor.runOnce();

    expect(run).toEqual({ pruned: 1, invalidatedEntries: 2 });
    expect(store.size).toBe(1);
    expect(cache.size).toBe(1);
    expect((await cache.get("fresh"))?.map((r) => r.title)).toEqual(["Fresh"]);
  });

  it("shares a run already in progress", () => {
    const { janitor } = setup();
    expect(janitor.runOnce()).toBe(janitor.runOnce());
  });

  it("runs on its interval once started", async () => {
    vi.useFakeTimers();
    const { store, janitor, advance } = setup({ janitorIntervalMs: 1_000 });
    await store.upsert(OLD);
    advance(3 * DAY_MS);

    janitor.start();
    await vi.advanceTimersByTimeAsync(1_000);
    janitor.stop();

    expect(store.size).toBe(0);
  });

  it("does not schedule anything with a zero interval", async () => {
    vi.useFakeTimers();
    const { store, janitor, advance } = setup();
    await store.upsert(OLD);
    advance(3 * DAY_MS);

    janitor.start();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(store.size).toBe(1);
  });
});
