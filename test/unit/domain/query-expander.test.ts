// ---------------------------------------------------------------------------
// Tests for query normalisation and variant expansion.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { expandQuery, normalizeQuery } from "../../../src/domain/query/query-expander.js";

describe("normalizeQuery", () => {
  it("trims and collapses whitespace", () => {
    expect(normalizeQuery("  bart   ehrman\t")).toBe("bart ehrman");
  });
});

describe("expandQuery", () => {
  it("expands a two-token query to phrase, last token, first token", () => {
    expect(expandQuery("bart ehrman")).toEqual(["bart ehrman", "ehrman", "bart"]);
  });

  it("returns a single-token query unchanged", () => {
    expect(expandQuery("Dune")).toEqual(["Dune"]);
  });

  it("adds the phrase without leading and trailing stop words", () => {
    expect(expandQuery("The Name of the Wind")).toEqual([
      "The Name of the Wind",
      "Wind",
      "The",
      "Name of the Wind",
    ]);
  });

  it("drops variants that repeat case-insensitively", () => {
    expect(expandQuery("Echo echo")).toEqual(["Echo echo", "echo"]);
  });

  it("never yields an empty variant", () => {
    expect(expandQuery("the")).toEqual(["the"]);
    expect(expandQuery("   ")).toEqual([]);
  });

  it("is deterministic", () => {
    expect(expandQuery("a tale of two cities")).toEqual(expandQuery("a tale of two cities"));
  });
});
