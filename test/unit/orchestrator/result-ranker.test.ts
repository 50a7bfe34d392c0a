// ---------------------------------------------------------------------------
// Tests for result ranking.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import type { CanonicalRecord } from "../../../src/core/types.js";
import { rankRecords } from "../../../src/orchestrator/result-ranker.js";
import { makeRecord } from "../../helpers/fakes.js";

function record(title: string, bestRankPosition: number, firstDiscoveryOrder: number): CanonicalRecord {
  return makeRecord({ title, bestRankPosition, firstDiscoveryOrder });
}

describe("rankRecords", () => {
  it("orders by best rank, then by discovery order", () => {
    const ranked = rankRecords(
      [record("c", 2, 0), record("a", 0, 3), record("b", 0, 1), record("d", 5, 2)],
      10,
    );
    expect(ranked.map((r) => r.title)).toEqual(["b", "a", "c", "d"]);
  });

  it("truncates to the limit", () => {
    const ranked = rankRecords([record("a", 0, 0), record("b", 1, 1), record("c", 2, 2)], 2);
    expect(ranked.map((r) => r.title)).toEqual(["a", "b"]);
  });

  it("returns nothing for a non-positive limit", () => {
    expect(rankRecords([record("a", 0, 0)], 0)).toEqual([]);
  });

  it("does not mutate its input", () => {
    const input = [record("b", 1, 0), record("a", 0, 1)];
    rankRecords(input, 5);
    expect(input.map((r) => r.title)).toEqual(["b", "a"]);
  });
});
