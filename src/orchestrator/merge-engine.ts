// ---------------------------------------------------------------------------
// Merge engine: cross-references and de-duplicates raw candidates into
// canonical records.
// ---------------------------------------------------------------------------

import type pino from "pino";

import { IdentifierKind } from "../core/types.js";
import type {
  Candidate,
  CanonicalRecord,
  Identifier,
  RecordSource,
  SourceHit,
  SourceName,
} from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import {
  equivalentIdentifiers,
  identifierKey,
  isbn10ToISBN13,
  isbn13ToISBN10,
  unionIdentifiers,
} from "../domain/identifier/identifier.js";

// ── Types ──────────────────────────────────────────────────────────────────

/** Resolves a literal primary-catalog id; `null` is a miss. */
export type IdentifierLookup = (id: Identifier) => Promise<SourceHit | null>;

export interface CrossReferenceOptions {
  /** Upper bound on distinct lookups per pass. */
  maxLookups: number;
}

// ── Normalisation (fuzzy matching) ─────────────────────────────────────────

/** Case-fold, strip accents and punctuation, collapse whitespace. */
export function normalizeText(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Normalised author-name tokens; single letters (initials) are ignored. */
export function authorTokens(authors: readonly string[]): Set<string> {
  const tokens = new Set<string>();
  for (const author of authors) {
    for (const token of normalizeText(author).split(" ")) {
      if (token.length >= 2) tokens.add(token);
    }
  }
  return tokens;
}

/**
 * Equal normalised titles and at least one shared author token.
 */
export function isFuzzyMatch(
  a: Pick<SourceHit, "title" | "authors">,
  b: Pick<SourceHit, "title" | "authors">,
): boolean {
  const titleA = normalizeText(a.title);
  if (titleA.length === 0 || titleA !== normalizeText(b.title)) return false;

  const tokensA = authorTokens(a.authors);
  for (const token of authorTokens(b.authors)) {
    if (tokensA.has(token)) return true;
  }
  return false;
}

// ── Union-find ─────────────────────────────────────────────────────────────

class DisjointSet {
  private readonly parent: number[];
  /** Primary ids carried by each root's group. */
  private readonly primaryIds: Array<Set<string>>;

  constructor(primaryIdsPerItem: Array<Set<string>>) {
    this.parent = primaryIdsPerItem.map((_, i) => i);
    this.primaryIds = primaryIdsPerItem.map((ids) => new Set(ids));
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root] ?? root;
    // Path compression
    let node = i;
    while (node !== root) {
      const next = this.parent[node] ?? root;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // Keep the earlier item as root so group order follows discovery order.
    const [root, child] = ra < rb ? [ra, rb] : [rb, ra];
    this.parent[child] = root;
    const rootIds = this.primaryIds[root];
    for (const id of this.primaryIds[child] ?? []) rootIds?.add(id);
  }

  /** Both groups carry primary ids and share none. */
  conflicts(a: number, b: number): boolean {
    const idsA = this.primaryIds[this.find(a)] ?? new Set<string>();
    const idsB = this.primaryIds[this.find(b)] ?? new Set<string>();
    if (idsA.size === 0 || idsB.size === 0) return false;
    for (const id of idsA) if (idsB.has(id)) return false;
    return true;
  }
}

// ── MergeEngine ────────────────────────────────────────────────────────────

/**
 * Merges candidates describing the same book.
 *
 * Matching, strongest first: primary id, ISBN-13 (ISBN-10s converted),
 * ISBN-10 (978 ISBN-13s converted), then title plus shared author token.
 * Fuzzy matches never join two groups that each carry different primary ids.
 *
 * Conflicting fields take the value from the highest-priority source that
 * supplies one; identifiers are unioned.
 */
export class MergeEngine {
  private readonly sourcePriority: readonly SourceName[];

  constructor(
    sourcePriority: readonly SourceName[],
    private readonly logger?: pino.Logger,
  ) {
    if (sourcePriority.length === 0) {
      throw new ConfigurationError("MergeEngine needs a non-empty source priority");
    }
    this.sourcePriority = [...sourcePriority];
  }

  // ── Cross-reference ──────────────────────────────────────────────────────

  /**
   * For secondary-source candidates that carry no primary id and are not
   * already tied to a primary-source candidate by ISBN, try each ISBN-10
   * form as a literal primary-catalog id. Every hit is appended as a new
   * candidate that inherits the secondary candidate's position and ISBNs,
   * so {@link merge} folds the two together. Misses are not errors.
   */
  async crossReference(
    candidates: readonly Candidate[],
    lookup: IdentifierLookup,
    options: CrossReferenceOptions,
  ): Promise<Candidate[]> {
    const primarySource = this.sourcePriority[0];
    const linked = new Set<string>();
    for (const c of candidates) {
      const hasPrimaryId = c.identifiers.some((i) => i.kind === IdentifierKind.PRIMARY_ID);
      if (c.source !== primarySource && !hasPrimaryId) continue;
      for (const key of isbnKeys(c.identifiers)) linked.add(key);
    }

    // Plan: candidate index -> ordered literal ids; distinct ids capped.
    const plan = new Map<number, string[]>();
    const distinct: string[] = [];
    candidates.forEach((c, index) => {
      if (c.source === primarySource) return;
      if (c.identifiers.some((i) => i.kind === IdentifierKind.PRIMARY_ID)) return;
      if (isbnKeys(c.identifiers).some((key) => linked.has(key))) return;

      const literals = isbn10Forms(c.identifiers).filter((value) => {
        if (distinct.includes(value)) return true;
        if (distinct.length >= options.maxLookups) return false;
        distinct.push(value);
        return true;
      });
      if (literals.length > 0) plan.set(index, literals);
    });

    if (distinct.length === 0) return [...candidates];

    const results = new Map<string, SourceHit | null>();
    await Promise.all(
      distinct.map(async (value) => {
        results.set(value, await this.safeLookup(lookup, value));
      }),
    );

    const appended: Candidate[] = [];
    for (const [index, literals] of plan) {
      const candidate = candidates[index];
      if (!candidate) continue;
      const hit = literals.map((v) => results.get(v) ?? null).find((h) => h !== null);
      if (!hit) continue;

      appended.push({
        ...hit,
        identifiers: unionIdentifiers(hit.identifiers, candidate.identifiers),
        variantIndex: candidate.variantIndex,
        rankPosition: candidate.rankPosition,
      });
    }

    this.logger?.debug(
      { lookups: distinct.length, recovered: appended.length },
      "cross-reference complete",
    );

    return [...candidates, ...appended];
  }

  // ── Merge ────────────────────────────────────────────────────────────────

  /**
   * Pure and deterministic: the same candidates always produce the same
   * records, in first-discovery order.
   */
  merge(candidates: readonly Candidate[]): CanonicalRecord[] {
    const items = candidates
      .map((candidate, order) => ({ candidate, order }))
      .filter(({ candidate }) => isValidCandidate(candidate));
    if (items.length === 0) return [];

    const sets = new DisjointSet(
      items.map(
        ({ candidate }) =>
          new Set(
            candidate.identifiers
              .filter((i) => i.kind === IdentifierKind.PRIMARY_ID)
              .map((i) => i.value),
          ),
      ),
    );

    // Rules 1-3: exact identifier equality.
    const owners = new Map<string, number>();
    items.forEach(({ candidate }, i) => {
      for (const key of matchKeys(candidate.identifiers)) {
        const owner = owners.get(key);
        if (owner === undefined) owners.set(key, i);
        else sets.union(owner, i);
      }
    });

    // Rule 4: fuzzy title + author, within equal-title buckets.
    const byTitle = new Map<string, number[]>();
    items.forEach(({ candidate }, i) => {
      const title = normalizeText(candidate.title);
      if (title.length === 0) return;
      const bucket = byTitle.get(title);
      if (bucket) bucket.push(i);
      else byTitle.set(title, [i]);
    });
    for (const bucket of byTitle.values()) {
      for (let x = 0; x < bucket.length; x++) {
        for (let y = x + 1; y < bucket.length; y++) {
          const a = bucket[x] ?? 0;
          const b = bucket[y] ?? 0;
          if (sets.find(a) === sets.find(b)) continue;
          const ca = items[a]?.candidate;
          const cb = items[b]?.candidate;
          if (!ca || !cb || !isFuzzyMatch(ca, cb) || sets.conflicts(a, b)) continue;
          sets.union(a, b);
        }
      }
    }

    // Group by root; roots are the earliest member, so Map order is
    // first-discovery order.
    const groups = new Map<number, Array<{ candidate: Candidate; order: number }>>();
    items.forEach((item, i) => {
      const root = sets.find(i);
      const group = groups.get(root);
      if (group) group.push(item);
      else groups.set(root, [item]);
    });

    const records = [...groups.values()].map((members) => this.buildRecord(members));
    records.sort((a, b) => a.firstDiscoveryOrder - b.firstDiscoveryOrder);
    return records;
  }

  // ── Private helpers ────────────────────────────────────────────────────

  private buildRecord(members: Array<{ candidate: Candidate; order: number }>): CanonicalRecord {
    const ordered = [...members].sort(
      (a, b) =>
        this.priorityOf(a.candidate.source) - this.priorityOf(b.candidate.source) ||
        a.order - b.order,
    );
    const cs = ordered.map((m) => m.candidate);

    const identifiers = unionIdentifiers(...cs.map((c) => c.identifiers));
    const primaryId = identifiers.find((i) => i.kind === IdentifierKind.PRIMARY_ID)?.value ?? null;
    const isbn10 =
      identifiers.find((i) => i.kind === IdentifierKind.ISBN10)?.value ??
      convertFirst(identifiers, IdentifierKind.ISBN13, (v) =>
        v.startsWith("978") ? isbn13ToISBN10(v) : null,
      );
    const isbn13 =
      identifiers.find((i) => i.kind === IdentifierKind.ISBN13)?.value ??
      convertFirst(identifiers, IdentifierKind.ISBN10, isbn10ToISBN13);

    const sources = new Set(cs.map((c) => c.source));
    const [onlySource] = [...sources];
    const source: RecordSource = sources.size === 1 && onlySource ? onlySource : "merged";

    const record: CanonicalRecord = {
      primaryId,
      isbn10,
      isbn13,
      identifiers: Object.freeze(identifiers.map((i) => Object.freeze({ ...i }))),
      title: firstNonEmpty(cs.map((c) => c.title.trim())) ?? "",
      subtitle: firstNonEmpty(cs.map((c) => c.subtitle)),
      authors: Object.freeze([...(cs.find((c) => c.authors.length > 0)?.authors ?? [])]),
      narrators: Object.freeze([...(cs.find((c) => c.narrators.length > 0)?.narrators ?? [])]),
      coverUrl: firstNonEmpty(cs.map((c) => c.coverUrl)),
      runtimeMinutes: cs.find((c) => c.runtimeMinutes !== null)?.runtimeMinutes ?? null,
      publishDate: firstNonEmpty(cs.map((c) => c.publishDate)),
      source,
      bestRankPosition: Math.min(...cs.map((c) => c.rankPosition)),
      firstDiscoveryOrder: Math.min(...members.map((m) => m.order)),
    };
    return Object.freeze(record);
  }

  private priorityOf(source: SourceName): number {
    const index = this.sourcePriority.indexOf(source);
    return index === -1 ? this.sourcePriority.length : index;
  }

  private async safeLookup(lookup: IdentifierLookup, value: string): Promise<SourceHit | null> {
    try {
      return await lookup({ kind: IdentifierKind.PRIMARY_ID, value });
    } catch (err: unknown) {
      this.logger?.warn({ value, err }, "cross-reference lookup failed; keeping candidate as-is");
      return null;
    }
  }
}

// ── Module helpers ─────────────────────────────────────────────────────────

/** At least one identifier, or a non-empty title with a named author. */
export function isValidCandidate(c: Pick<SourceHit, "identifiers" | "title" | "authors">): boolean {
  if (c.identifiers.length > 0) return true;
  return c.title.trim().length > 0 && c.authors.some((a) => a.trim().length > 0);
}

/** Keys under which two candidates are considered the same book. */
function matchKeys(identifiers: readonly Identifier[]): string[] {
  const keys: string[] = [];
  for (const id of identifiers) {
    if (id.kind === IdentifierKind.PRIMARY_ID) {
      keys.push(identifierKey(id));
    } else {
      for (const form of equivalentIdentifiers(id)) keys.push(identifierKey(form));
    }
  }
  return keys;
}

function isbnKeys(identifiers: readonly Identifier[]): string[] {
  return matchKeys(identifiers.filter((i) => i.kind !== IdentifierKind.PRIMARY_ID));
}

/** ISBN-10 values, own ones first, then those converted from 978 ISBN-13s. */
function isbn10Forms(identifiers: readonly Identifier[]): string[] {
  const own = identifiers.filter((i) => i.kind === IdentifierKind.ISBN10).map((i) => i.value);
  const converted = identifiers
    .filter((i) => i.kind === IdentifierKind.ISBN13 && i.value.startsWith("978"))
    .map((i) => isbn13ToISBN10(i.value));
  return [...new Set([...own, ...converted])];
}

function convertFirst(
  identifiers: readonly Identifier[],
  kind: IdentifierKind,
  convert: (value: string) => string | null,
): string | null {
  for (const id of identifiers) {
    if (id.kind !== kind) continue;
    const converted = convert(id.value);
    if (converted) return converted;
  }
  return null;
}

function firstNonEmpty(values: ReadonlyArray<string | null>): string | null {
  for (const v of values) {
    if (v !== null && v.trim().length > 0) return v;
  }
  return null;
}
