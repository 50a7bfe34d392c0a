// ---------------------------------------------------------------------------
// Tests for the HealthTracker.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { HealthTracker } from "../../../src/cache/health-tracker.js";
import { FailureKind, SourceName } from "../../../src/core/types.js";

describe("HealthTracker", () => {
  let tracker: HealthTracker;

  beforeEach(() => {
    tracker = new HealthTracker();
  });

  // ── recordSuccess ─────────────────────────────────────────────────────

  it("records a success and increments the success counter", () => {
    tracker.recordSuccess(SourceName.AUDIBLE, 100);
    expect(tracker.getSourceHealth(SourceName.AUDIBLE)?.successCount).toBe(1);
  });

  it("records lastSuccessTime as an ISO timestamp", () => {
    tracker.recordSuccess(SourceName.AUDIBLE, 10);
    const stamp = tracker.getSourceHealth(SourceName.AUDIBLE)?.lastSuccessTime ?? "";
    expect(new Date(stamp).toISOString()).toBe(stamp);
  });

  it("accumulates totalDurationMs across outcomes", () => {
    tracker.recordSuccess(SourceName.AUDIBLE, 100);
    tracker.recordFailure(SourceName.AUDIBLE, FailureKind.TIMEOUT, "slow", 250);
    expect(tracker.getSourceHealth(SourceName.AUDIBLE)?.totalDurationMs).toBe(350);
  });

  // ── recordFailure ─────────────────────────────────────────────────────

  it("stores the kind and message of the last failure", () => {
    tracker.recordFailure(SourceName.GOOGLE_BOOKS, FailureKind.TIMEOUT, "first error", 100);
    tracker.recordFailure(SourceName.GOOGLE_BOOKS, FailureKind.PARSE, "second error", 100);

    expect(tracker.getSourceHealth(SourceName.GOOGLE_BOOKS)).toMatchObject({
      source: "google_books",
      failureCount: 2,
      consecutiveFailures: 2,
      lastFailureKind: "parse",
      lastErrorMessage: "second error",
      lastSuccessTime: null,
    });
  });

  it("resets consecutive failures on success", () => {
    tracker.recordFailure(SourceName.OPEN_LIBRARY, FailureKind.UNAVAILABLE, "503", 10);
    tracker.recordFailure(SourceName.OPEN_LIBRARY, FailureKind.UNAVAILABLE, "503", 10);
    tracker.recordSuccess(SourceName.OPEN_LIBRARY, 10);

    expect(tracker.getSourceHealth(SourceName.OPEN_LIBRARY)).toMatchObject({
      failureCount: 2,
      successCount: 1,
      consecutiveFailures: 0,
    });
  });

  // ── getSourceHealth ───────────────────────────────────────────────────

  it("returns null for an untracked source", () => {
    expect(tracker.getSourceHealth(SourceName.AUDIBLE)).toBeNull();
  });

  it("returns a copy that does not alias tracker state", () => {
    tracker.recordSuccess(SourceName.AUDIBLE, 10);
    const snap = tracker.getSourceHealth(SourceName.AUDIBLE);
    if (snap) snap.successCount = 999;
    expect(tracker.getSourceHealth(SourceName.AUDIBLE)?.successCount).toBe(1);
  });

  // ── getSuccessRate ────────────────────────────────────────────────────

  it("returns 0 for an untracked source", () => {
    expect(tracker.getSuccessRate(SourceName.AUDIBLE)).toBe(0);
  });

  it("calculates the success rate with mixed results", () => {
    tracker.recordSuccess(SourceName.AUDIBLE, 10);
    tracker.recordSuccess(SourceName.AUDIBLE, 10);
    tracker.recordFailure(SourceName.AUDIBLE, FailureKind.UNKNOWN, "err", 10);
    expect(tracker.getSuccessRate(SourceName.AUDIBLE)).toBeCloseTo(2 / 3);
  });

  // ── getAllHealth ───────────────────────────────────────────────────────

  it("tracks sources independently", () => {
    tracker.recordSuccess(SourceName.AUDIBLE, 10);
    tracker.recordFailure(SourceName.GOOGLE_BOOKS, FailureKind.TIMEOUT, "err", 20);

    const all = tracker.getAllHealth();
    expect([...all.keys()]).toEqual(["audible", "google_books"]);
    expect(all.get(SourceName.AUDIBLE)?.failureCount).toBe(0);
    expect(all.get(SourceName.GOOGLE_BOOKS)?.successCount).toBe(0);
  });
});
