// ---------------------------------------------------------------------------
// Tests for candidate merging and ISBN cross-referencing.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi } from "vitest";

import { SourceName } from "../../../src/core/types.js";
import type { Identifier, SourceHit } from "../../../src/core/types.js";
import { ConfigurationError } from "../../../src/core/errors.js";
import {
  MergeEngine,
  isFuzzyMatch,
  normalizeText,
} from "../../../src/orchestrator/merge-engine.js";
import {
  createTestLogger,
  isbn10,
  isbn13,
  makeCandidate,
  makeHit,
  primaryId,
} from "../../helpers/fakes.js";

const PRIORITY = [SourceName.AUDIBLE, SourceName.GOOGLE_BOOKS, SourceName.OPEN_LIBRARY];

function engine(): MergeEngine {
  return new MergeEngine(PRIORITY, createTestLogger());
}

describe("MergeEngine", () => {
  it("requires a non-empty source priority", () => {
    expect(() => new MergeEngine([])).toThrow(ConfigurationError);
  });

  // ── Identifier matching ─────────────────────────────────────────────────

  it("merges candidates sharing a primary id", () => {
    const records = engine().merge([
      makeCandidate({ identifiers: [primaryId("B08G9PRS1K")], title: "Blackwater" }),
      makeCandidate({ identifiers: [primaryId("B08G9PRS1K")], title: "Blackwater", variantIndex: 1 }),
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]?.primaryId).toBe("B08G9PRS1K");
    expect(records[0]?.source).toBe("audible");
  });

  it("matches an ISBN-10 against the equivalent ISBN-13", () => {
    const records = engine().merge([
      makeCandidate({
        source: SourceName.GOOGLE_BOOKS,
        identifiers: [isbn13("9780306406157")],
        title: "Signal Processing",
      }),
      makeCandidate({
        source: SourceName.OPEN_LIBRARY,
        identifiers: [isbn10("0306406152")],
        title: "Signal processing : a primer",
      }),
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      isbn10: "0306406152",
      isbn13: "9780306406157",
      source: "merged",
      title: "Signal Processing",
    });
  });

  it("keeps the best position a book reached across variants", () => {
    const records = engine().merge([
      makeCandidate({
        identifiers: [primaryId("B00000000X")],
        title: "Forged",
        variantIndex: 0,
        rankPosition: 5,
      }),
      makeCandidate({
        identifiers: [primaryId("B00000000X")],
        title: "Forged",
        variantIndex: 1,
        rankPosition: 2,
      }),
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]?.bestRankPosition).toBe(2);
  });

  it("takes each field from the highest-priority source that has it", () => {
    const records = engine().merge([
      makeCandidate({
        source: SourceName.GOOGLE_BOOKS,
        identifiers: [isbn13("9781797101026")],
        title: "Misquoting Jesus: The Story",
        authors: ["Bart Ehrman"],
        coverUrl: "https://covers.example/g.jpg",
        publishDate: "2005-11-01",
        rankPosition: 3,
      }),
      makeCandidate({
        source: SourceName.AUDIBLE,
        identifiers: [primaryId("1797101021"), isbn10("1797101021")],
        title: "Misquoting Jesus",
        authors: ["Bart D. Ehrman"],
        narrators: ["Sample Narrator"],
        runtimeMinutes: 540,
        rankPosition: 1,
      }),
    ]);

    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record).toMatchObject({
      primaryId: "1797101021",
      isbn10: "1797101021",
      isbn13: "9781797101026",
      title: "Misquoting Jesus",
      authors: ["Bart D. Ehrman"],
      narrators: ["Sample Narrator"],
      coverUrl: "https://covers.example/g.jpg",
      runtimeMinutes: 540,
      publishDate: "2005-11-01",
      source: "merged",
      bestRankPosition: 1,
      firstDiscoveryOrder: 0,
    });
    expect(record?.identifiers).toEqual([
      primaryId("1797101021"),
      isbn10("1797101021"),
      isbn13("9781797101026"),
    ]);
  });

  // ── Fuzzy matching ──────────────────────────────────────────────────────

  it("merges identifier-less candidates with equal titles and a shared author token", () => {
    const records = engine().merge([
      makeCandidate({
        source: SourceName.GOOGLE_BOOKS,
        title: "Misquoting Jesus",
        authors: ["Bart D. Ehrman"],
      }),
      makeCandidate({
        source: SourceName.OPEN_LIBRARY,
        title: "misquoting jesus!",
        authors: ["Ehrman, Bart"],
      }),
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]?.title).toBe("Misquoting Jesus");
    expect(records[0]?.source).toBe("merged");
  });

  it("keeps same-title books by different authors apart", () => {
    const records = engine().merge([
      makeCandidate({ source: SourceName.GOOGLE_BOOKS, title: "Emma", authors: ["Jane Austen"] }),
      makeCandidate({ source: SourceName.OPEN_LIBRARY, title: "Emma", authors: ["Ali Smith"] }),
    ]);
    expect(records).toHaveLength(2);
  });

  it("never fuzzy-joins groups carrying different primary ids", () => {
    const records = engine().merge([
      makeCandidate({ identifiers: [primaryId("B0000000AA")], title: "Dune", authors: ["Frank Herbert"] }),
      makeCandidate({ identifiers: [primaryId("B0000000BB")], title: "Dune", authors: ["Frank Herbert"] }),
      makeCandidate({ source: SourceName.GOOGLE_BOOKS, title: "Dune", authors: ["Frank Herbert"] }),
    ]);

    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({ primaryId: "B0000000AA", source: "merged" });
    expect(records[1]).toMatchObject({ primaryId: "B0000000BB", source: "audible" });
  });

  // ── Validity, order, immutability ───────────────────────────────────────

  it("drops candidates with neither identifiers nor title and author", () => {
    const records = engine().merge([
      makeCandidate({ title: "", authors: [] }),
      makeCandidate({ title: "Orphan Title", authors: [] }),
      makeCandidate({ title: "Kept", authors: ["Some Author"] }),
    ]);
    expect(records.map((r) => r.title)).toEqual(["Kept"]);
    expect(records[0]?.firstDiscoveryOrder).toBe(2);
  });

  it("returns records in first-discovery order, frozen", () => {
    const records = engine().merge([
      makeCandidate({ identifiers: [primaryId("B0000000AA")], title: "First" }),
      makeCandidate({ identifiers: [primaryId("B0000000BB")], title: "Second" }),
      makeCandidate({ identifiers: [primaryId("B0000000AA")], title: "First again" }),
    ]);

    expect(records.map((r) => r.title)).toEqual(["First", "Second"]);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0]?.identifiers)).toBe(true);
  });

  it("is deterministic", () => {
    const input = [
      makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn13("9780596520687")], title: "A" }),
      makeCandidate({ identifiers: [primaryId("0596520689"), isbn10("0596520689")], title: "B" }),
      makeCandidate({ source: SourceName.OPEN_LIBRARY, title: "C", authors: ["Writer"] }),
    ];
    expect(engine().merge(input)).toEqual(engine().merge(input));
  });

  // ── Cross-reference ─────────────────────────────────────────────────────

  describe("crossReference", () => {
    const catalogHit = makeHit({
      source: SourceName.AUDIBLE,
      identifiers: [primaryId("1797101021"), isbn10("1797101021"), isbn13("9781797101026")],
      title: "Misquoting Jesus",
      authors: ["Bart D. Ehrman"],
    });

    function lookupReturning(hits: Record<string, SourceHit>) {
      return vi.fn(async (id: Identifier) => hits[id.value] ?? null);
    }

    it("recovers a primary-catalog record through a secondary ISBN", async () => {
      const secondary = makeCandidate({
        source: SourceName.GOOGLE_BOOKS,
        identifiers: [isbn13("9781797101026")],
        title: "Misquoting Jesus",
        authors: ["Bart D. Ehrman"],
        rankPosition: 2,
      });
      const lookup = lookupReturning({ "1797101021": catalogHit });

      const m = engine();
      const candidates = await m.crossReference([secondary], lookup, { maxLookups: 20 });

      expect(lookup).toHaveBeenCalledTimes(1);
      expect(lookup).toHaveBeenCalledWith(primaryId("1797101021"));
      expect(candidates).toHaveLength(2);
      expect(candidates[1]).toMatchObject({ source: "audible", variantIndex: 0, rankPosition: 2 });

      const records = m.merge(candidates);
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        primaryId: "1797101021",
        isbn13: "9781797101026",
        source: "merged",
        bestRankPosition: 2,
      });
    });

    it("skips secondary candidates already tied to the primary catalog", async () => {
      const lookup = lookupReturning({ "1797101021": catalogHit });
      const candidates = await engine().crossReference(
        [
          makeCandidate({ identifiers: [primaryId("1797101021"), isbn10("1797101021")] }),
          makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn13("9781797101026")] }),
        ],
        lookup,
        { maxLookups: 20 },
      );

      expect(lookup).not.toHaveBeenCalled();
      expect(candidates).toHaveLength(2);
    });

    it("treats misses as non-errors", async () => {
      const input = [
        makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn10("0306406152")] }),
      ];
      const candidates = await engine().crossReference(input, lookupReturning({}), {
        maxLookups: 20,
      });
      expect(candidates).toEqual(input);
    });

    it("caps the number of distinct lookups", async () => {
      const lookup = lookupReturning({});
      await engine().crossReference(
        [
          makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn10("0306406152")] }),
          makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn10("0596520689")] }),
          makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn10("080442957X")] }),
        ],
        lookup,
        { maxLookups: 2 },
      );

      expect(lookup.mock.calls.map(([id]) => id.value)).toEqual(["0306406152", "0596520689"]);
    });

    it("keeps the candidate when a lookup throws", async () => {
      const input = [
        makeCandidate({ source: SourceName.GOOGLE_BOOKS, identifiers: [isbn10("0306406152")] }),
      ];
      const lookup = vi.fn(async () => {
        throw new Error("catalog down");
      });
      await expect(
        engine().crossReference(input, lookup, { maxLookups: 5 }),
      ).resolves.toEqual(input);
    });
  });
});

describe("fuzzy helpers", () => {
  it("normalises case, accents and punctuation", () => {
    expect(normalizeText("  Les Misérables:  Tome I ")).toBe("les miserables tome i");
  });

  it("ignores single-letter author initials", () => {
    expect(
      isFuzzyMatch(
        { title: "Dune", authors: ["F. Herbert"] },
        { title: "Dune", authors: ["F. Scott"] },
      ),
    ).toBe(false);
  });
});
