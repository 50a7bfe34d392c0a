// ---------------------------------------------------------------------------
// Integration tests for AudibleSource.
//
// Mocks global fetch to return catalog search, book-detail and suggestion
// payloads.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";

import { AudibleSource } from "../../../src/sources/audible/audible-source.js";
import { SourceParseError, SourceUnavailableError } from "../../../src/core/errors.js";
import type { SourceDefinition } from "../../../src/core/types.js";
import { createTestLogger, isbn10, isbn13, primaryId } from "../../helpers/fakes.js";

// ── Fixtures ─────────────────────────────────────────────────────────────

const DEFINITION: SourceDefinition = {
  name: "audible",
  enabled: true,
  baseUrl: "https://api.audible.com",
  lookupUrls: ["https://audimeta.de/book", "https://api.audnex.us/books"],
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function createSearchResponse() {
  return {
    products: [
      {
        asin: "B08G9PRS1K",
        title: "Blackwater",
        subtitle: "The Complete Saga",
        authors: [{ name: "Michael McDowell" }],
        narrators: [{ name: "Sample Reader" }],
        product_images: { "500": "https://img.example/blackwater.jpg" },
        runtime_length_min: 1200,
        release_date: "2020-09-01",
      },
      {
        asin: "1797101021",
        title: "Misquoting Jesus",
        authors: [{ name: "Bart D. Ehrman" }],
      },
      { asin: "hello", title: "Not a catalog id" },
    ],
  };
}

const BOOK_DETAIL = {
  asin: "1797101021",
  title: "Misquoting Jesus",
  authors: [{ name: "Bart D. Ehrman" }],
  narrators: [{ name: "Sample Reader" }],
  image: "https://img.example/misquoting.jpg",
  runtimeLengthMin: 540,
  releaseDate: "2005-11-01T00:00:00.000Z",
};

// ── Tests ────────────────────────────────────────────────────────────────

describe("AudibleSource", () => {
  let mockFetch: MockInstance<typeof fetch>;
  let source: AudibleSource;

  beforeEach(() => {
    mockFetch = vi.spyOn(globalThis, "fetch");
    source = new AudibleSource(DEFINITION, createTestLogger());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function requestedUrl(call: number): URL {
    return new URL(String(mockFetch.mock.calls[call]?.[0]));
  }

  // ── Search ──────────────────────────────────────────────────────────────

  it("maps catalog products to hits and skips unusable ids", async () => {
    mockFetch.mockResolvedValueOnce(json(createSearchResponse()));

    const hits = await source.searchByText("blackwater", 20, { region: "us" });

    expect(hits).toHaveLength(2);
    expect(hits[0]).toEqual({
      source: "audible",
      identifiers: [primaryId("B08G9PRS1K")],
      title: "Blackwater",
      subtitle: "The Complete Saga",
      authors: ["Michael McDowell"],
      narrators: ["Sample Reader"],
      coverUrl: "https://img.example/blackwater.jpg",
      runtimeMinutes: 1200,
      publishDate: "2020-09-01",
    });
    expect(hits[1]?.identifiers).toEqual([
      primaryId("1797101021"),
      isbn10("1797101021"),
      isbn13("9781797101026"),
    ]);
    expect(hits[1]?.coverUrl).toBeNull();
  });

  it("queries the regional storefront with a capped page size", async () => {
    mockFetch.mockResolvedValueOnce(json({ products: [] }));

    await source.searchByText("blackwater", 80, { region: "uk" });

    const url = requestedUrl(0);
    expect(url.hostname).toBe("api.audible.co.uk");
    expect(url.pathname).toBe("/1.0/catalog/products");
    expect(url.searchParams.get("keywords")).toBe("blackwater");
    expect(url.searchParams.get("num_results")).toBe("50");
  });

  it("throws SourceUnavailableError on a server error", async () => {
    mockFetch.mockResolvedValueOnce(new Response("Server Error", { status: 503 }));

    await expect(source.searchByText("dune", 10, { region: "us" })).rejects.toMatchObject({
      name: "SourceUnavailableError",
      status: 503,
    });
  });

  it("throws SourceUnavailableError on a network failure", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(source.searchByText("dune", 10, { region: "us" })).rejects.toBeInstanceOf(
      SourceUnavailableError,
    );
  });

  it("throws SourceParseError on an unexpected body", async () => {
    mockFetch.mockResolvedValueOnce(json({ products: "nope" }));

    await expect(source.searchByText("dune", 10, { region: "us" })).rejects.toBeInstanceOf(
      SourceParseError,
    );
  });

  // ── Lookup ──────────────────────────────────────────────────────────────

  it("falls through to the next lookup endpoint on a miss", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response("Not Found", { status: 404 }))
      .mockResolvedValueOnce(json(BOOK_DETAIL));

    const hit = await source.lookupByIdentifier(primaryId("1797101021"), { region: "us" });

    expect(hit).toMatchObject({
      title: "Misquoting Jesus",
      coverUrl: "https://img.example/misquoting.jpg",
      runtimeMinutes: 540,
      publishDate: "2005-11-01",
    });
    expect(requestedUrl(0).toString()).toBe("https://audimeta.de/book/1797101021?region=us");
    expect(requestedUrl(1).toString()).toBe("https://api.audnex.us/books/1797101021?region=us");
  });

  it("returns null when an endpoint answered and none had the book", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response("Server Error", { status: 500 }))
      .mockResolvedValueOnce(new Response("Not Found", { status: 404 }));

    expect(await source.lookupByIdentifier(primaryId("B08G9PRS1K"), { region: "us" })).toBeNull();
  });

  it("rethrows when no endpoint answered", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response("Server Error", { status: 500 }))
      .mockResolvedValueOnce(new Response("Bad Gateway", { status: 502 }));

    await expect(
      source.lookupByIdentifier(primaryId("B08G9PRS1K"), { region: "us" }),
    ).rejects.toMatchObject({ status: 502 });
  });

  it("ignores identifier kinds it cannot look up", async () => {
    expect(await source.lookupByIdentifier(isbn13("9781797101026"), { region: "us" })).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  // ── Suggestions ─────────────────────────────────────────────────────────

  it("extracts suggestion titles", async () => {
    mockFetch.mockResolvedValueOnce(
      json({
        model: {
          items: [
            { model: { product_metadata: { title: { value: "Dune" } } } },
            { model: { title_group: { title: { value: "Dune Messiah" } } } },
            { model: {} },
          ],
        },
      }),
    );

    expect(await source.suggest("dun", { region: "de" })).toEqual(["Dune", "Dune Messiah"]);
    expect(requestedUrl(0).hostname).toBe("api.audible.de");
    expect(requestedUrl(0).searchParams.get("key_strokes")).toBe("dun");
  });
});
