// ---------------------------------------------------------------------------
// Per-source health tracking.
// ---------------------------------------------------------------------------

import type { FailureKind, SourceName } from "../core/types.js";

/**
 * Point-in-time health snapshot for a single catalog source.
 */
export interface SourceHealthSnapshot {
  source: SourceName;
  lastSuccessTime: string | null;
  lastFailureTime: string | null;
  lastFailureKind: FailureKind | null;
  lastErrorMessage: string | null;
  successCount: number;
  failureCount: number;
  /** Failures since the last success. */
  consecutiveFailures: number;
  totalDurationMs: number;
}

/**
 * Tracks per-source health so operators can tell "every source is failing"
 * apart from "nothing matched".
 */
export class HealthTracker {
  private readonly records = new Map<SourceName, SourceHealthSnapshot>();

  recordSuccess(source: SourceName, durationMs: number): void {
    const rec = this.getOrCreate(source);
    rec.successCount++;
    rec.consecutiveFailures = 0;
    rec.totalDurationMs += durationMs;
    rec.lastSuccessTime = new Date().toISOString();
  }

  recordFailure(
    source: SourceName,
    kind: FailureKind,
    error: string,
    durationMs: number,
  ): void {
    const rec = this.getOrCreate(source);
    rec.failureCount++;
    rec.consecutiveFailures++;
    rec.totalDurationMs += durationMs;
    rec.lastFailureTime = new Date().toISOString();
    rec.lastFailureKind = kind;
    rec.lastErrorMessage = error;
  }

  getSourceHealth(source: SourceName): SourceHealthSnapshot | null {
    const rec = this.records.get(source);
    return rec ? { ...rec } : null;
  }

  getAllHealth(): Map<SourceName, SourceHealthSnapshot> {
    const result = new Map<SourceName, SourceHealthSnapshot>();
    for (const [key, rec] of this.records) {
      result.set(key, { ...rec });
    }
    return result;
  }

  getSuccessRate(source: SourceName): number {
    const rec = this.records.get(source);
    if (!rec) return 0;

    const total = rec.successCount + rec.failureCount;
    return total === 0 ? 0 : rec.successCount / total;
  }

  private getOrCreate(source: SourceName): SourceHealthSnapshot {
    let rec = this.records.get(source);

    if (!rec) {
      rec = {
        source,
        lastSuccessTime: null,
        lastFailureTime: null,
        lastFailureKind: null,
        lastErrorMessage: null,
        successCount: 0,
        failureCount: 0,
        consecutiveFailures: 0,
        totalDurationMs: 0,
      };
      this.records.set(source, rec);
    }

    return rec;
  }
}
