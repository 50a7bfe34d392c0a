// ---------------------------------------------------------------------------
// Google Books source: volume search and ISBN lookup.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { z } from "zod";

import { IdentifierKind } from "../../core/types.js";
import type {
  Identifier,
  SourceCallContext,
  SourceDefinition,
  SourceHit,
} from "../../core/types.js";
import { classifyIdentifier } from "../../domain/identifier/identifier.js";
import { BaseSource } from "../base/base-source.js";

/** The volumes endpoint caps `maxResults` at 40. */
const MAX_PAGE_SIZE = 40;

const VolumeSchema = z.object({
  id: z.string(),
  volumeInfo: z
    .object({
      title: z.string().nullish(),
      subtitle: z.string().nullish(),
      authors: z.array(z.string()).nullish(),
      publishedDate: z.string().nullish(),
      industryIdentifiers: z
        .array(z.object({ type: z.string(), identifier: z.string() }))
        .nullish(),
      imageLinks: z
        .object({
          thumbnail: z.string().nullish(),
          smallThumbnail: z.string().nullish(),
        })
        .nullish(),
    })
    .default({}),
});

const VolumesResponseSchema = z.object({
  totalItems: z.number().optional(),
  items: z.array(VolumeSchema).default([]),
});

type Volume = z.infer<typeof VolumeSchema>;

/**
 * Secondary source speaking ISBN. Volumes without a title are skipped.
 */
export class GoogleBooksSource extends BaseSource {
  private readonly apiKey: string | null;

  constructor(definition: SourceDefinition, logger: Logger, apiKey: string | null = null) {
    super(definition, logger);
    this.apiKey = apiKey;
  }

  supports(kind: IdentifierKind): boolean {
    return kind === IdentifierKind.ISBN10 || kind === IdentifierKind.ISBN13;
  }

  protected async executeSearch(
    query: string,
    limit: number,
    ctx: SourceCallContext,
  ): Promise<SourceHit[]> {
    const volumes = await this.fetchVolumes(query, Math.min(limit, MAX_PAGE_SIZE), ctx.signal);
    return volumes.flatMap((v) => {
      const hit = this.toHit(v);
      return hit ? [hit] : [];
    });
  }

  protected async executeLookup(
    id: Identifier,
    ctx: SourceCallContext,
  ): Promise<SourceHit | null> {
    const [first] = await this.fetchVolumes(`isbn:${id.value}`, 1, ctx.signal);
    return first ? this.toHit(first) : null;
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async fetchVolumes(
    q: string,
    maxResults: number,
    signal: AbortSignal | undefined,
  ): Promise<Volume[]> {
    const url = new URL(this.definition.baseUrl);
    url.searchParams.set("q", q);
    url.searchParams.set("maxResults", String(maxResults));
    url.searchParams.set("printType", "books");
    if (this.apiKey) url.searchParams.set("key", this.apiKey);

    const body = await this.getJson(url, VolumesResponseSchema, signal);
    return body?.items ?? [];
  }

  private toHit(volume: Volume): SourceHit | null {
    const info = volume.volumeInfo;
    if (!info.title) return null;

    const identifiers: Identifier[] = [];
    for (const entry of info.industryIdentifiers ?? []) {
      const id = classifyIdentifier(entry.identifier);
      if (!id) continue;
      if (
        (entry.type === "ISBN_10" && id.kind === IdentifierKind.ISBN10) ||
        (entry.type === "ISBN_13" && id.kind === IdentifierKind.ISBN13)
      ) {
        identifiers.push(id);
      }
    }

    return {
      source: this.name,
      identifiers,
      title: info.title,
      subtitle: info.subtitle ?? null,
      authors: info.authors ?? [],
      narrators: [],
      coverUrl: info.imageLinks?.thumbnail ?? info.imageLinks?.smallThumbnail ?? null,
      runtimeMinutes: null,
      publishDate: this.normalizeDate(info.publishedDate),
    };
  }
}
