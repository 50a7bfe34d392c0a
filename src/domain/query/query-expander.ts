// ---------------------------------------------------------------------------
// Query expansion: widen recall with cheap, deterministic variants.
// ---------------------------------------------------------------------------

const STOP_WORDS: ReadonlySet<string> = new Set(["the", "and", "of", "a"]);

/** Trim and collapse internal whitespace. */
export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, " ");
}

/**
 * Expand a query into ordered variants:
 *
 * 1. the (whitespace-normalised) query itself
 * 2. its last token, then its first token, for multi-token queries
 * 3. the phrase with leading/trailing stop-words removed
 *
 * Variants are never empty and never repeat (case-insensitive); order of
 * first appearance is kept. `"bart ehrman"` yields
 * `["bart ehrman", "ehrman", "bart"]`.
 */
export function expandQuery(query: string): string[] {
  const phrase = normalizeQuery(query);
  if (phrase.length === 0) return [];

  const tokens = phrase.split(" ");
  const variants: string[] = [];
  const seen = new Set<string>();

  const add = (variant: string): void => {
    const key = variant.toLowerCase();
    if (variant.length === 0 || seen.has(key)) return;
    seen.add(key);
    variants.push(variant);
  };

  add(phrase);

  if (tokens.length >= 2) {
    add(tokens[tokens.length - 1] ?? "");
    add(tokens[0] ?? "");
  }

  add(stripStopWords(tokens).join(" "));

  return variants;
}

function stripStopWords(tokens: string[]): string[] {
  let start = 0;
  let end = tokens.length;
  while (start < end && STOP_WORDS.has((tokens[start] ?? "").toLowerCase())) start++;
  while (end > start && STOP_WORDS.has((tokens[end - 1] ?? "").toLowerCase())) end--;
  return tokens.slice(start, end);
}
