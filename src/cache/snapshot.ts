// ---------------------------------------------------------------------------
// Detached snapshots of canonical records for the result cache.
// ---------------------------------------------------------------------------

import { IdentifierKind } from "../core/types.js";
import type { CanonicalRecord, Identifier, RecordSnapshot } from "../core/types.js";
import { identifierKey } from "../domain/identifier/identifier.js";

/**
 * The identifier a snapshot is re-resolved by: primary id, else ISBN-13,
 * else ISBN-10. `null` when the record carries none of them.
 */
export function lookupIdentifierFor(
  record: Pick<CanonicalRecord, "primaryId" | "isbn13" | "isbn10">,
): Identifier | null {
  if (record.primaryId) return { kind: IdentifierKind.PRIMARY_ID, value: record.primaryId };
  if (record.isbn13) return { kind: IdentifierKind.ISBN13, value: record.isbn13 };
  if (record.isbn10) return { kind: IdentifierKind.ISBN10, value: record.isbn10 };
  return null;
}

/**
 * Deep, frozen copy of a record. Records with no identifier cannot be
 * re-resolved and yield `null`.
 */
export function toSnapshot(record: CanonicalRecord): RecordSnapshot | null {
  const lookup = lookupIdentifierFor(record);
  if (!lookup) return null;

  return Object.freeze({
    primaryId: record.primaryId,
    isbn10: record.isbn10,
    isbn13: record.isbn13,
    identifiers: Object.freeze(record.identifiers.map((i) => Object.freeze({ ...i }))),
    title: record.title,
    subtitle: record.subtitle,
    authors: Object.freeze([...record.authors]),
    narrators: Object.freeze([...record.narrators]),
    coverUrl: record.coverUrl,
    runtimeMinutes: record.runtimeMinutes,
    publishDate: record.publishDate,
    source: record.source,
    bestRankPosition: record.bestRankPosition,
    firstDiscoveryOrder: record.firstDiscoveryOrder,
    lookup: Object.freeze({ ...lookup }),
  });
}

/** Whether the snapshot refers to any of the given identifier keys. */
export function snapshotReferences(snapshot: RecordSnapshot, keys: ReadonlySet<string>): boolean {
  if (keys.has(identifierKey(snapshot.lookup))) return true;
  if (snapshot.primaryId && keys.has(`${IdentifierKind.PRIMARY_ID}:${snapshot.primaryId}`)) {
    return true;
  }
  if (snapshot.isbn13 && keys.has(`${IdentifierKind.ISBN13}:${snapshot.isbn13}`)) return true;
  if (snapshot.isbn10 && keys.has(`${IdentifierKind.ISBN10}:${snapshot.isbn10}`)) return true;
  return snapshot.identifiers.some((i) => keys.has(identifierKey(i)));
}
