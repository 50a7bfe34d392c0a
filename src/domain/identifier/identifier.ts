// ---------------------------------------------------------------------------
// Identifier classification, normalisation and ISBN-10/13 conversion.
// ---------------------------------------------------------------------------

import { IdentifierKind } from "../../core/types.js";
import type { Identifier, IdentifierKey } from "../../core/types.js";
import { InvalidIdentifierError, NotConvertibleError } from "../../core/errors.js";
import {
  computeISBN10CheckDigit,
  computeISBN13CheckDigit,
  verifyISBN10CheckDigit,
  verifyISBN13CheckDigit,
} from "./check-digit.js";

const ISBN10_SHAPE = /^\d{9}[\dX]$/;
const ISBN13_SHAPE = /^\d{13}$/;
const TEN_DIGITS = /^\d{10}$/;
/** Catalog ids of the form B + nine alphanumerics (e.g. B08G9PRS1K). */
const ALPHANUMERIC_PRIMARY_ID = /^B[0-9A-Z]{9}$/;

/** Shapes a free-text query must already have to be tried as an identifier. */
const QUERY_IDENTIFIER_SHAPE = /^(\d{9}[\dXx]|\d{13}|B[0-9A-Z]{9})$/;

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Strip hyphens and whitespace, then uppercase. */
export function normalizeIdentifierValue(raw: string): string {
  return raw.trim().replace(/[\s-]/g, "").toUpperCase();
}

export function identifierKey(id: Identifier): IdentifierKey {
  return `${id.kind}:${id.value}` as IdentifierKey;
}

// ── Classification ──────────────────────────────────────────────────────────

/**
 * Classify a raw string. Returns `null` when the value is unclassified.
 *
 * A 10-digit numeral is an ISBN-10 when its checksum passes and a
 * primary-catalog id otherwise.
 */
export function classifyIdentifier(raw: string): Identifier | null {
  const value = normalizeIdentifierValue(raw);
  if (value.length === 0) return null;

  if (ISBN13_SHAPE.test(value) && verifyISBN13CheckDigit(value)) {
    return { kind: IdentifierKind.ISBN13, value };
  }
  if (ISBN10_SHAPE.test(value) && verifyISBN10CheckDigit(value)) {
    return { kind: IdentifierKind.ISBN10, value };
  }
  if (TEN_DIGITS.test(value) || ALPHANUMERIC_PRIMARY_ID.test(value)) {
    return { kind: IdentifierKind.PRIMARY_ID, value };
  }
  return null;
}

/** Like {@link classifyIdentifier} but throws on unclassified input. */
export function parseIdentifier(raw: string): Identifier {
  const id = classifyIdentifier(raw);
  if (id) return id;

  const reason =
    normalizeIdentifierValue(raw).length === 0
      ? "empty value"
      : "not an ISBN-10, ISBN-13 or catalog id";
  throw new InvalidIdentifierError(raw, reason);
}

// ── Conversion ──────────────────────────────────────────────────────────────

export function isbn10ToISBN13(isbn10: string): string {
  const value = normalizeIdentifierValue(isbn10);
  if (!verifyISBN10CheckDigit(value)) {
    throw new InvalidIdentifierError(isbn10, "not a valid ISBN-10");
  }
  const prefix12 = "978" + value.slice(0, 9);
  return prefix12 + computeISBN13CheckDigit(prefix12);
}

/**
 * Only Bookland 978 ISBN-13s have an ISBN-10 form; anything else throws
 * {@link NotConvertibleError}.
 */
export function isbn13ToISBN10(isbn13: string): string {
  const value = normalizeIdentifierValue(isbn13);
  if (!verifyISBN13CheckDigit(value)) {
    throw new InvalidIdentifierError(isbn13, "not a valid ISBN-13");
  }
  if (!value.startsWith("978")) {
    throw new NotConvertibleError(value);
  }
  const body9 = value.slice(3, 12);
  return body9 + computeISBN10CheckDigit(body9);
}

/**
 * The identifier plus its ISBN-10/13 counterpart where one exists. Primary
 * ids have no equivalents.
 */
export function equivalentIdentifiers(id: Identifier): Identifier[] {
  switch (id.kind) {
    case IdentifierKind.ISBN10:
      return [id, { kind: IdentifierKind.ISBN13, value: isbn10ToISBN13(id.value) }];
    case IdentifierKind.ISBN13:
      return id.value.startsWith("978")
        ? [id, { kind: IdentifierKind.ISBN10, value: isbn13ToISBN10(id.value) }]
        : [id];
    case IdentifierKind.PRIMARY_ID:
      return [id];
  }
}

// ── Direct lookup ───────────────────────────────────────────────────────────

/**
 * The primary-catalog id a free-text query should be tried as, or `null`.
 *
 * ISBN-10 and catalog-id queries are used literally; a 978 ISBN-13 is tried
 * through its ISBN-10 form, since that is the shape catalog ids share.
 */
export function directLookupIdentifier(query: string): Identifier | null {
  const compact = query.trim().replace(/-/g, "");
  if (!QUERY_IDENTIFIER_SHAPE.test(compact)) return null;

  const id = classifyIdentifier(compact);
  if (!id) return null;

  if (id.kind === IdentifierKind.ISBN13) {
    if (!id.value.startsWith("978")) return null;
    return { kind: IdentifierKind.PRIMARY_ID, value: isbn13ToISBN10(id.value) };
  }
  return { kind: IdentifierKind.PRIMARY_ID, value: id.value };
}

/** Union of identifier lists, first occurrence wins, order kept. */
export function unionIdentifiers(...lists: ReadonlyArray<readonly Identifier[]>): Identifier[] {
  const seen = new Set<IdentifierKey>();
  const out: Identifier[] = [];
  for (const list of lists) {
    for (const id of list) {
      const key = identifierKey(id);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push({ kind: id.kind, value: id.value });
    }
  }
  return out;
}
