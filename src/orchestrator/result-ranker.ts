// ---------------------------------------------------------------------------
// Result ranking: stable order by best source rank, then discovery order.
// ---------------------------------------------------------------------------

import type { CanonicalRecord } from "../core/types.js";

/**
 * Sort by `bestRankPosition` ascending, ties broken by `firstDiscoveryOrder`,
 * then truncate to `limit`. The input is not mutated.
 *
 * A limit of zero or less yields an empty list.
 */
export function rankRecords<T extends CanonicalRecord>(
  records: readonly T[],
  limit: number,
): T[] {
  if (limit <= 0) return [];

  return [...records]
    .sort(
      (a, b) =>
        a.bestRankPosition - b.bestRankPosition ||
        a.firstDiscoveryOrder - b.firstDiscoveryOrder,
    )
    .slice(0, limit);
}
