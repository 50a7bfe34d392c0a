// ---------------------------------------------------------------------------
// Open Library source: work search and ISBN lookup.
// ---------------------------------------------------------------------------

import { z } from "zod";

import { IdentifierKind } from "../../core/types.js";
import type { Identifier, SourceCallContext, SourceHit } from "../../core/types.js";
import { classifyIdentifier, identifierKey } from "../../domain/identifier/identifier.js";
import { BaseSource } from "../base/base-source.js";

/**
 * A work lists every edition's ISBN; keep the first few so one popular work
 * does not fan out into dozens of cross-reference lookups.
 */
const MAX_ISBNS_PER_DOC = 10;

const DocSchema = z.object({
  key: z.string().nullish(),
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  author_name: z.array(z.string()).nullish(),
  first_publish_year: z.number().nullish(),
  isbn: z.array(z.string()).nullish(),
  cover_i: z.number().nullish(),
});

const SearchResponseSchema = z.object({
  numFound: z.number().optional(),
  docs: z.array(DocSchema).default([]),
});

type Doc = z.infer<typeof DocSchema>;

export function coverUrlFor(coverId: number): string {
  return `https://covers.openlibrary.org/b/id/${coverId}-M.jpg`;
}

export class OpenLibrarySource extends BaseSource {
  supports(kind: IdentifierKind): boolean {
    return kind === IdentifierKind.ISBN10 || kind === IdentifierKind.ISBN13;
  }

  protected async executeSearch(
    query: string,
    limit: number,
    ctx: SourceCallContext,
  ): Promise<SourceHit[]> {
    const docs = await this.fetchDocs(query, limit, ctx.signal);
    return docs.flatMap((d) => {
      const hit = this.toHit(d);
      return hit ? [hit] : [];
    });
  }

  protected async executeLookup(
    id: Identifier,
    ctx: SourceCallContext,
  ): Promise<SourceHit | null> {
    const [first] = await this.fetchDocs(`isbn:${id.value}`, 1, ctx.signal);
    return first ? this.toHit(first) : null;
  }

  private async fetchDocs(
    q: string,
    limit: number,
    signal: AbortSignal | undefined,
  ): Promise<Doc[]> {
    const url = new URL(this.definition.baseUrl);
    url.searchParams.set("q", q);
    url.searchParams.set("limit", String(limit));
    url.searchParams.set("lang", "en");

    const body = await this.getJson(url, SearchResponseSchema, signal);
    return body?.docs ?? [];
  }

  private toHit(doc: Doc): SourceHit | null {
    if (!doc.title) return null;

    const identifiers: Identifier[] = [];
    const seen = new Set<string>();
    for (const raw of doc.isbn ?? []) {
      if (identifiers.length >= MAX_ISBNS_PER_DOC) break;
      const id = classifyIdentifier(raw);
      if (!id || id.kind === IdentifierKind.PRIMARY_ID) continue;
      const key = identifierKey(id);
      if (seen.has(key)) continue;
      seen.add(key);
      identifiers.push(id);
    }

    return {
      source: this.name,
      identifiers,
      title: doc.title,
      subtitle: doc.subtitle ?? null,
      authors: doc.author_name ?? [],
      narrators: [],
      coverUrl: doc.cover_i != null ? coverUrlFor(doc.cover_i) : null,
      runtimeMinutes: null,
      publishDate: this.normalizeDate(doc.first_publish_year),
    };
  }
}
