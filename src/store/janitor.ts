// ---------------------------------------------------------------------------
// Store janitor: prunes stale rows and drops cache entries that point at them.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { AudiobookStore, Identifier, StoreConfig } from "../core/types.js";
import type { SnapshotCache } from "../cache/snapshot-cache.js";
import { IdentifierKind } from "../core/types.js";

export interface JanitorRun {
  pruned: number;
  invalidatedEntries: number;
}

export class StoreJanitor {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<JanitorRun> | null = null;

  constructor(
    private readonly store: AudiobookStore,
    private readonly cache: SnapshotCache,
    private readonly config: StoreConfig,
    private readonly logger: pino.Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  start(): void {
    if (this.timer !== null || this.config.janitorIntervalMs <= 0) return;

    this.timer = setInterval(() => {
      this.runOnce().catch((err: unknown) => {
        this.logger.error({ err }, "store janitor run failed");
      });
    }, this.config.janitorIntervalMs);
    this.timer.unref();
  }

  /** Overlapping calls share the run already in progress. */
  runOnce(): Promise<JanitorRun> {
    if (this.running) return this.running;
    this.running = this.prune().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async prune(): Promise<JanitorRun> {
    const cutoff = new Date(this.now().getTime() - this.config.staleAfterSeconds * 1000);
    const removed = await this.store.pruneStale(cutoff);

    let invalidatedEntries = 0;
    for (const row of removed) {
      const ids: Identifier[] = [];
      if (row.primaryId) ids.push({ kind: IdentifierKind.PRIMARY_ID, value: row.primaryId });
      if (row.isbn13) ids.push({ kind: IdentifierKind.ISBN13, value: row.isbn13 });
      else if (row.isbn10) ids.push({ kind: IdentifierKind.ISBN10, value: row.isbn10 });
      for (const id of ids) invalidatedEntries += this.cache.invalidateByIdentifier(id);
    }

    if (removed.length > 0) {
      this.logger.info(
        { pruned: removed.length, invalidatedEntries, cutoff: cutoff.toISOString() },
        "pruned stale audiobooks",
      );
    }
    return { pruned: removed.length, invalidatedEntries };
  }
}
