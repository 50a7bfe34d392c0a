// ---------------------------------------------------------------------------
// Audible catalog source: text search, catalog-id lookup and suggestions.
// ---------------------------------------------------------------------------

import { z } from "zod";

import { IdentifierKind, Region } from "../../core/types.js";
import type {
  Identifier,
  SourceCallContext,
  SourceHit,
  SuggestionProvider,
} from "../../core/types.js";
import { classifyIdentifier, equivalentIdentifiers } from "../../domain/identifier/identifier.js";
import { BaseSource } from "../base/base-source.js";

/** Top-level domain of the regional Audible storefront. */
export const REGION_TLD: Record<Region, string> = {
  [Region.US]: ".com",
  [Region.CA]: ".ca",
  [Region.UK]: ".co.uk",
  [Region.AU]: ".com.au",
  [Region.FR]: ".fr",
  [Region.DE]: ".de",
  [Region.JP]: ".co.jp",
  [Region.IT]: ".it",
  [Region.IN]: ".in",
  [Region.ES]: ".es",
  [Region.BR]: ".com.br",
};

/** The catalog API rejects larger pages. */
const MAX_PAGE_SIZE = 50;

const RESPONSE_GROUPS = "contributors,media,product_attrs,product_desc";

// ── Response schemas ────────────────────────────────────────────────────────

const PersonSchema = z.object({ name: z.string() });

const CatalogProductSchema = z.object({
  asin: z.string().min(1),
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  authors: z.array(PersonSchema).nullish(),
  narrators: z.array(PersonSchema).nullish(),
  product_images: z.record(z.string()).nullish(),
  runtime_length_min: z.number().nullish(),
  release_date: z.string().nullish(),
});

const CatalogSearchSchema = z.object({
  products: z.array(CatalogProductSchema).default([]),
});

/**
 * Book-by-id payload. Audimeta and Audnexus share most fields and differ in
 * the cover and runtime keys, so one schema accepts both.
 */
const BookDetailSchema = z.object({
  asin: z.string().min(1),
  title: z.string().min(1),
  subtitle: z.string().nullish(),
  authors: z.array(PersonSchema).default([]),
  narrators: z.array(PersonSchema).default([]),
  imageUrl: z.string().nullish(),
  image: z.string().nullish(),
  releaseDate: z.string().nullish(),
  lengthMinutes: z.number().nullish(),
  runtimeLengthMin: z.number().nullish(),
});

const TitleValueSchema = z.object({ value: z.string() });

const SuggestionsSchema = z.object({
  model: z.object({
    items: z
      .array(
        z.object({
          model: z.object({
            product_metadata: z.object({ title: TitleValueSchema }).nullish(),
            title_group: z.object({ title: TitleValueSchema }).nullish(),
          }),
        }),
      )
      .default([]),
  }),
});

// ── AudibleSource ───────────────────────────────────────────────────────────

/**
 * Primary catalog. Searches the regional Audible storefront and resolves
 * catalog ids through the configured metadata mirrors, which also know
 * titles the storefront search does not index.
 */
export class AudibleSource extends BaseSource implements SuggestionProvider {
  supports(kind: IdentifierKind): boolean {
    return kind === IdentifierKind.PRIMARY_ID;
  }

  async suggest(query: string, ctx: SourceCallContext): Promise<string[]> {
    return this.measure("suggest", query, async () => {
      const url = new URL("/1.0/searchsuggestions", this.regionalBaseUrl(ctx.region));
      url.searchParams.set("key_strokes", query);
      url.searchParams.set("site_variant", "desktop");

      const body = await this.getJson(url, SuggestionsSchema, ctx.signal);
      if (!body) return [];

      const titles: string[] = [];
      for (const item of body.model.items) {
        const title =
          item.model.product_metadata?.title.value ?? item.model.title_group?.title.value;
        if (title) titles.push(title);
      }
      return titles;
    });
  }

  // ── BaseSource implementation ───────────────────────────────────────────

  protected async executeSearch(
    query: string,
    limit: number,
    ctx: SourceCallContext,
  ): Promise<SourceHit[]> {
    const url = new URL("/1.0/catalog/products", this.regionalBaseUrl(ctx.region));
    url.searchParams.set("keywords", query);
    url.searchParams.set("num_results", String(Math.min(limit, MAX_PAGE_SIZE)));
    url.searchParams.set("products_sort_by", "Relevance");
    url.searchParams.set("response_groups", RESPONSE_GROUPS);
    url.searchParams.set("image_sizes", "500");

    const body = await this.getJson(url, CatalogSearchSchema, ctx.signal);
    if (!body) return [];

    const hits: SourceHit[] = [];
    for (const product of body.products) {
      const identifiers = this.identifiersForAsin(product.asin);
      if (identifiers.length === 0) continue;

      const images = product.product_images ?? {};
      hits.push({
        source: this.name,
        identifiers,
        title: product.title ?? "",
        subtitle: product.subtitle ?? null,
        authors: (product.authors ?? []).map((a) => a.name),
        narrators: (product.narrators ?? []).map((n) => n.name),
        coverUrl: images["500"] ?? Object.values(images)[0] ?? null,
        runtimeMinutes: product.runtime_length_min ?? null,
        publishDate: this.normalizeDate(product.release_date),
      });
    }
    return hits;
  }

  /**
   * Try each lookup endpoint in order. A 404 from every endpoint is a miss;
   * if no endpoint answered at all, the last error is rethrown.
   */
  protected async executeLookup(
    id: Identifier,
    ctx: SourceCallContext,
  ): Promise<SourceHit | null> {
    let lastError: unknown = null;
    let answered = false;

    for (const endpoint of this.definition.lookupUrls) {
      const url = new URL(`${endpoint.replace(/\/+$/, "")}/${encodeURIComponent(id.value)}`);
      url.searchParams.set("region", ctx.region);

      try {
        const book = await this.getJson(url, BookDetailSchema, ctx.signal);
        answered = true;
        if (!book) {
          this.logger.debug({ asin: id.value, endpoint: url.hostname }, "Lookup miss");
          continue;
        }
        return {
          source: this.name,
          identifiers: this.identifiersForAsin(book.asin),
          title: book.title,
          subtitle: book.subtitle ?? null,
          authors: book.authors.map((a) => a.name),
          narrators: book.narrators.map((n) => n.name),
          coverUrl: book.imageUrl ?? book.image ?? null,
          runtimeMinutes: book.lengthMinutes ?? book.runtimeLengthMin ?? null,
          publishDate: this.normalizeDate(book.releaseDate),
        };
      } catch (error: unknown) {
        if (ctx.signal?.aborted) throw error;
        lastError = error;
        this.logger.warn(
          { asin: id.value, endpoint: url.hostname, err: error },
          "Lookup endpoint failed, trying next",
        );
      }
    }

    if (!answered && lastError !== null) throw lastError;
    return null;
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private regionalBaseUrl(region: Region): string {
    const url = new URL(this.definition.baseUrl);
    url.hostname = url.hostname.replace(/\.com$/, REGION_TLD[region]);
    return url.toString();
  }

  /**
   * A catalog id is always a primary id; one that is also a checksum-valid
   * ISBN-10 contributes its ISBN forms too.
   */
  private identifiersForAsin(asin: string): Identifier[] {
    const classified = classifyIdentifier(asin);
    if (!classified) return [];

    const primary: Identifier = { kind: IdentifierKind.PRIMARY_ID, value: classified.value };
    if (classified.kind === IdentifierKind.ISBN10) {
      return [primary, ...equivalentIdentifiers(classified)];
    }
    return [primary];
  }
}
