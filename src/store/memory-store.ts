// ---------------------------------------------------------------------------
// In-process audiobook store, used when no database is configured.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";

import { IdentifierKind } from "../core/types.js";
import type {
  AudiobookStore,
  CanonicalRecord,
  Identifier,
  IdentifierKey,
  RecordId,
  StoredAudiobook,
} from "../core/types.js";
import { equivalentIdentifiers, identifierKey } from "../domain/identifier/identifier.js";

/** Identifier keys under which a row is indexed. */
export function rowKeys(row: Pick<StoredAudiobook, "primaryId" | "isbn10" | "isbn13">): IdentifierKey[] {
  const keys: IdentifierKey[] = [];
  if (row.primaryId) keys.push(identifierKey({ kind: IdentifierKind.PRIMARY_ID, value: row.primaryId }));
  if (row.isbn13) keys.push(identifierKey({ kind: IdentifierKind.ISBN13, value: row.isbn13 }));
  if (row.isbn10) keys.push(identifierKey({ kind: IdentifierKind.ISBN10, value: row.isbn10 }));
  return keys;
}

/**
 * Map-backed {@link AudiobookStore}. Rows are indexed by primary id, ISBN-13
 * and ISBN-10; reads hand out copies.
 */
export class InMemoryAudiobookStore implements AudiobookStore {
  private readonly rows = new Map<RecordId, StoredAudiobook>();
  private readonly index = new Map<IdentifierKey, RecordId>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async fetchByIdentifierSet(
    ids: readonly Identifier[],
  ): Promise<Map<IdentifierKey, StoredAudiobook>> {
    const result = new Map<IdentifierKey, StoredAudiobook>();
    for (const id of ids) {
      const row = this.find(id);
      if (row) result.set(identifierKey(id), copy(row));
    }
    return result;
  }

  async upsert(record: CanonicalRecord): Promise<StoredAudiobook> {
    const existing = rowKeys(record)
      .map((key) => this.index.get(key))
      .find((rowId) => rowId !== undefined);

    const previous = existing ? this.rows.get(existing) : undefined;
    const id = existing ?? (randomUUID() as RecordId);

    // Identifiers already on the row survive an update that lacks them, and
    // a value another row is indexed under is never taken over.
    const claim = (
      kind: IdentifierKind,
      value: string | null,
      kept: string | null,
    ): string | null => {
      if (value === null) return kept;
      const owner = this.index.get(identifierKey({ kind, value }));
      return owner !== undefined && owner !== id ? kept : value;
    };

    const row: StoredAudiobook = {
      id,
      primaryId: claim(IdentifierKind.PRIMARY_ID, record.primaryId, previous?.primaryId ?? null),
      isbn10: claim(IdentifierKind.ISBN10, record.isbn10, previous?.isbn10 ?? null),
      isbn13: claim(IdentifierKind.ISBN13, record.isbn13, previous?.isbn13 ?? null),
      title: record.title,
      subtitle: record.subtitle,
      authors: [...record.authors],
      narrators: [...record.narrators],
      coverUrl: record.coverUrl,
      runtimeMinutes: record.runtimeMinutes,
      publishDate: record.publishDate,
      source: record.source,
      updatedAt: this.now().toISOString(),
    };

    if (existing) this.unindex(existing);
    this.rows.set(row.id, row);
    for (const key of rowKeys(row)) this.index.set(key, row.id);
    return copy(row);
  }

  async deleteByIdentifier(id: Identifier): Promise<StoredAudiobook | null> {
    const row = this.find(id);
    if (!row) return null;
    this.unindex(row.id);
    this.rows.delete(row.id);
    return copy(row);
  }

  async pruneStale(olderThan: Date): Promise<StoredAudiobook[]> {
    const cutoff = olderThan.getTime();
    const removed: StoredAudiobook[] = [];
    for (const row of [...this.rows.values()]) {
      if (Date.parse(row.updatedAt) >= cutoff) continue;
      this.unindex(row.id);
      this.rows.delete(row.id);
      removed.push(copy(row));
    }
    return removed;
  }

  get size(): number {
    return this.rows.size;
  }

  private find(id: Identifier): StoredAudiobook | null {
    const forms = id.kind === IdentifierKind.PRIMARY_ID ? [id] : equivalentIdentifiers(id);
    for (const form of forms) {
      const rowId = this.index.get(identifierKey(form));
      const row = rowId ? this.rows.get(rowId) : undefined;
      if (row) return row;
    }
    return null;
  }

  private unindex(rowId: RecordId): void {
    for (const [key, indexed] of [...this.index]) {
      if (indexed === rowId) this.index.delete(key);
    }
  }
}

function copy(row: StoredAudiobook): StoredAudiobook {
  return { ...row, authors: [...row.authors], narrators: [...row.narrators] };
}
