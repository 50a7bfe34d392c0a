// ---------------------------------------------------------------------------
// PostgreSQL-backed audiobook store.
// ---------------------------------------------------------------------------

import pg from "pg";
import { randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type pino from "pino";
import { z } from "zod";

import { IdentifierKind } from "../core/types.js";
import { StaleReferenceError } from "../core/errors.js";
import type {
  AudiobookStore,
  CanonicalRecord,
  Identifier,
  IdentifierKey,
  RecordId,
  StoredAudiobook,
} from "../core/types.js";
import { equivalentIdentifiers, identifierKey } from "../domain/identifier/identifier.js";
import { rowKeys } from "./memory-store.js";

/** Select/write rounds before an upsert gives up on a row that keeps moving. */
const MAX_UPSERT_ATTEMPTS = 3;

/**
 * `COALESCE(param, column)` unless another row already holds `param` in
 * that unique column.
 */
function keepIfOwned(column: string, param: string): string {
  return (
    `CASE WHEN EXISTS (SELECT 1 FROM audiobooks o WHERE o.${column} = ${param} AND o.id <> a.id) ` +
    `THEN a.${column} ELSE COALESCE(${param}, a.${column}) END`
  );
}

/** The part of `pg.Pool` the store uses; tests pass a fake. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const COLUMNS =
  "id, primary_id, isbn10, isbn13, title, subtitle, authors, narrators, " +
  "cover_url, runtime_minutes, publish_date, source, updated_at";

const RowSchema = z.object({
  id: z.string(),
  primary_id: z.string().nullable(),
  isbn10: z.string().nullable(),
  isbn13: z.string().nullable(),
  title: z.string(),
  subtitle: z.string().nullable(),
  authors: z.array(z.string()),
  narrators: z.array(z.string()),
  cover_url: z.string().nullable(),
  runtime_minutes: z.number().int().nullable(),
  publish_date: z.string().nullable(),
  source: z.enum(["audible", "google_books", "openlibrary", "merged"]),
  updated_at: z.union([z.date(), z.string()]),
});

function toStored(raw: unknown): StoredAudiobook {
  const row = RowSchema.parse(raw);
  return {
    id: row.id as RecordId,
    primaryId: row.primary_id,
    isbn10: row.isbn10,
    isbn13: row.isbn13,
    title: row.title,
    subtitle: row.subtitle,
    authors: row.authors,
    narrators: row.narrators,
    coverUrl: row.cover_url,
    runtimeMinutes: row.runtime_minutes,
    publishDate: row.publish_date,
    source: row.source,
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

/**
 * Split identifiers into per-column value lists, ISBNs expanded to both
 * forms, for a `col = ANY($n)` filter.
 */
export function identifierFilter(ids: readonly Identifier[]): {
  clause: string;
  values: [string[], string[], string[]];
} {
  const primary = new Set<string>();
  const isbn13 = new Set<string>();
  const isbn10 = new Set<string>();
  for (const id of ids) {
    const forms = id.kind === IdentifierKind.PRIMARY_ID ? [id] : equivalentIdentifiers(id);
    for (const form of forms) {
      if (form.kind === IdentifierKind.PRIMARY_ID) primary.add(form.value);
      else if (form.kind === IdentifierKind.ISBN13) isbn13.add(form.value);
      else isbn10.add(form.value);
    }
  }
  return {
    clause: "primary_id = ANY($1::text[]) OR isbn13 = ANY($2::text[]) OR isbn10 = ANY($3::text[])",
    values: [[...primary], [...isbn13], [...isbn10]],
  };
}

// ── Pool & schema ──────────────────────────────────────────────────────────

export function createPool(connectionString: string, logger: pino.Logger): pg.Pool {
  const pool = new pg.Pool({ connectionString, max: 8 });
  // Dead connections are removed and replaced by the pool.
  pool.on("error", (err) => {
    logger.error({ err }, "postgres pool background error");
  });
  return pool;
}

export async function initSchema(db: Queryable): Promise<void> {
  const sql = readFileSync(fileURLToPath(new URL("./schema.sql", import.meta.url)), "utf-8");
  await db.query(sql);
}

// ── PgAudiobookStore ───────────────────────────────────────────────────────

export class PgAudiobookStore implements AudiobookStore {
  constructor(private readonly db: Queryable) {}

  async fetchByIdentifierSet(
    ids: readonly Identifier[],
  ): Promise<Map<IdentifierKey, StoredAudiobook>> {
    const result = new Map<IdentifierKey, StoredAudiobook>();
    if (ids.length === 0) return result;

    const filter = identifierFilter(ids);
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM audiobooks WHERE ${filter.clause}`,
      filter.values,
    );
    const byKey = new Map<IdentifierKey, StoredAudiobook>();
    for (const raw of rows) {
      const row = toStored(raw);
      for (const key of rowKeys(row)) byKey.set(key, row);
    }

    for (const id of ids) {
      const forms = id.kind === IdentifierKind.PRIMARY_ID ? [id] : equivalentIdentifiers(id);
      const row = forms.map((f) => byKey.get(identifierKey(f))).find((r) => r !== undefined);
      if (row) result.set(identifierKey(id), row);
    }
    return result;
  }

  /**
   * Select the matching row, then update it or insert a new one. A row
   * pruned between the select and the update, or an insert that loses to a
   * concurrent pass, sends the loop round again. Identifier columns already
   * owned by another row are left unchanged.
   */
  async upsert(record: CanonicalRecord): Promise<StoredAudiobook> {
    const values = [
      record.primaryId,
      record.isbn10,
      record.isbn13,
      record.title,
      record.subtitle,
      [...record.authors],
      [...record.narrators],
      record.coverUrl,
      record.runtimeMinutes,
      record.publishDate,
      record.source,
    ];

    for (let attempt = 1; attempt <= MAX_UPSERT_ATTEMPTS; attempt++) {
      const existing = await this.db.query(
        `SELECT id FROM audiobooks
         WHERE primary_id = $1 OR isbn10 = $2 OR isbn13 = $3
         ORDER BY (primary_id = $1) IS TRUE DESC, (isbn13 = $3) IS TRUE DESC
         LIMIT 1`,
        [record.primaryId, record.isbn10, record.isbn13],
      );
      const match = z.array(z.object({ id: z.string() })).parse(existing.rows)[0];

      if (match) {
        const { rows } = await this.db.query(
          `UPDATE audiobooks AS a SET
             primary_id = ${keepIfOwned("primary_id", "$2")},
             isbn10 = ${keepIfOwned("isbn10", "$3")},
             isbn13 = ${keepIfOwned("isbn13", "$4")},
             title = $5,
             subtitle = $6,
             authors = $7,
             narrators = $8,
             cover_url = $9,
             runtime_minutes = $10,
             publish_date = $11,
             source = $12,
             updated_at = NOW()
           WHERE a.id = $1
           RETURNING ${COLUMNS}`,
          [match.id, ...values],
        );
        const [updated] = rows;
        if (updated !== undefined) return toStored(updated);
        continue;
      }

      const { rows } = await this.db.query(
        `INSERT INTO audiobooks
           (id, primary_id, isbn10, isbn13, title, subtitle, authors, narrators,
            cover_url, runtime_minutes, publish_date, source, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, NOW())
         ON CONFLICT DO NOTHING
         RETURNING ${COLUMNS}`,
        [randomUUID(), ...values],
      );
      const [inserted] = rows;
      if (inserted !== undefined) return toStored(inserted);
    }

    throw new StaleReferenceError(
      `audiobook "${record.title}" kept changing underneath ${MAX_UPSERT_ATTEMPTS} upsert attempts`,
    );
  }

  async deleteByIdentifier(id: Identifier): Promise<StoredAudiobook | null> {
    const filter = identifierFilter([id]);
    const { rows } = await this.db.query(
      `DELETE FROM audiobooks WHERE ${filter.clause} RETURNING ${COLUMNS}`,
      filter.values,
    );
    const [first] = rows;
    return first === undefined ? null : toStored(first);
  }

  async pruneStale(olderThan: Date): Promise<StoredAudiobook[]> {
    const { rows } = await this.db.query(
      `DELETE FROM audiobooks WHERE updated_at < $1 RETURNING ${COLUMNS}`,
      [olderThan],
    );
    return rows.map(toStored);
  }
}
