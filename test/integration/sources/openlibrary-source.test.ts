// ---------------------------------------------------------------------------
// Integration tests for OpenLibrarySource.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";

import { OpenLibrarySource } from "../../../src/sources/openlibrary/openlibrary-source.js";
import type { SourceDefinition } from "../../../src/core/types.js";
import { createTestLogger, isbn10, isbn13 } from "../../helpers/fakes.js";

const DEFINITION: SourceDefinition = {
  name: "openlibrary",
  enabled: true,
  baseUrl: "https://openlibrary.org/search.json",
  lookupUrls: [],
};

const MANY_ISBNS = [
  "1797101021", "9781797101026",
  "0306406152", "9780306406157",
  "0596520689", "9780596520687",
  "080442957X", "9780804429573",
  "155404295X", "9781554042951",
  "123456789X", "9781234567897",
  "020161622X", "9780201616224",
];

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

describe("OpenLibrarySource", () => {
  let mockFetch: MockInstance<typeof fetch>;
  let source: OpenLibrarySource;

  beforeEach(() => {
    mockFetch = vi.spyOn(globalThis, "fetch");
    source = new OpenLibrarySource(DEFINITION, createTestLogger());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps docs to hits with de-duplicated ISBNs", async () => {
    mockFetch.mockResolvedValueOnce(
      json({
        numFound: 2,
        docs: [
          {
            key: "/works/OL1W",
            title: "Signal Processing",
            author_name: ["Ada Writer"],
            first_publish_year: 1990,
            isbn: ["0306406152", "9780306406157", "0306406152", "not-an-isbn"],
            cover_i: 12345,
          },
          { key: "/works/OL2W" },
        ],
      }),
    );

    const hits = await source.searchByText("signal processing", 10, { region: "us" });

    expect(hits).toEqual([
      {
        source: "openlibrary",
        identifiers: [isbn10("0306406152"), isbn13("9780306406157")],
        title: "Signal Processing",
        subtitle: null,
        authors: ["Ada Writer"],
        narrators: [],
        coverUrl: "https://covers.openlibrary.org/b/id/12345-M.jpg",
        runtimeMinutes: null,
        publishDate: "1990",
      },
    ]);
    const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(url.searchParams.get("q")).toBe("signal processing");
    expect(url.searchParams.get("limit")).toBe("10");
  });

  it("keeps at most ten ISBNs per work", async () => {
    mockFetch.mockResolvedValueOnce(json({ docs: [{ title: "Anthology", isbn: MANY_ISBNS }] }));

    const [hit] = await source.searchByText("anthology", 10, { region: "us" });

    expect(hit?.identifiers.map((i) => i.value)).toEqual(MANY_ISBNS.slice(0, 10));
  });

  it("looks up an ISBN with an isbn: query", async () => {
    mockFetch.mockResolvedValueOnce(json({ docs: [] }));

    expect(await source.lookupByIdentifier(isbn10("0596520689"), { region: "us" })).toBeNull();
    const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(url.searchParams.get("q")).toBe("isbn:0596520689");
    expect(url.searchParams.get("limit")).toBe("1");
  });
});
