// ---------------------------------------------------------------------------
// Core domain types for the audiobook locator.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** Stable comparison key for an identifier, e.g. `isbn13:9781797101024`. */
export type IdentifierKey = string & { readonly __brand: "IdentifierKey" };

/** Store-assigned row id (uuid). */
export type RecordId = string & { readonly __brand: "RecordId" };

// ── Enums ───────────────────────────────────────────────────────────────────

export const IdentifierKind = {
  ISBN10: "isbn10",
  ISBN13: "isbn13",
  PRIMARY_ID: "primary_id",
} as const;
export type IdentifierKind = (typeof IdentifierKind)[keyof typeof IdentifierKind];

export const SourceName = {
  AUDIBLE: "audible",
  GOOGLE_BOOKS: "google_books",
  OPEN_LIBRARY: "openlibrary",
} as const;
export type SourceName = (typeof SourceName)[keyof typeof SourceName];

/** A record's provenance: one source, or several merged together. */
export type RecordSource = SourceName | "merged";

export const Region = {
  US: "us",
  CA: "ca",
  UK: "uk",
  AU: "au",
  FR: "fr",
  DE: "de",
  JP: "jp",
  IT: "it",
  IN: "in",
  ES: "es",
  BR: "br",
} as const;
export type Region = (typeof Region)[keyof typeof Region];

export const FailureKind = {
  UNAVAILABLE: "unavailable",
  TIMEOUT: "timeout",
  PARSE: "parse",
  UNKNOWN: "unknown",
} as const;
export type FailureKind = (typeof FailureKind)[keyof typeof FailureKind];

// ── Identifiers ─────────────────────────────────────────────────────────────

/** A classified identifier. `value` carries no separators and is uppercase. */
export interface Identifier {
  kind: IdentifierKind;
  value: string;
}

// ── Candidates & records ────────────────────────────────────────────────────

/** One hit as returned by a source, before the aggregator stamps its position. */
export interface SourceHit {
  source: SourceName;
  identifiers: Identifier[];
  title: string;
  subtitle: string | null;
  authors: string[];
  narrators: string[];
  coverUrl: string | null;
  runtimeMinutes: number | null;
  /** ISO date (YYYY-MM-DD) or year, as the source reports it. */
  publishDate: string | null;
}

/** Raw evidence from one source for one query variant. */
export interface Candidate extends SourceHit {
  variantIndex: number;
  /** Zero-based position within this source+variant's own result list. */
  rankPosition: number;
}

/** The merged, de-duplicated unit produced by a single aggregation pass. */
export interface CanonicalRecord {
  readonly primaryId: string | null;
  readonly isbn10: string | null;
  readonly isbn13: string | null;
  readonly identifiers: readonly Identifier[];
  readonly title: string;
  readonly subtitle: string | null;
  readonly authors: readonly string[];
  readonly narrators: readonly string[];
  readonly coverUrl: string | null;
  readonly runtimeMinutes: number | null;
  readonly publishDate: string | null;
  readonly source: RecordSource;
  readonly bestRankPosition: number;
  readonly firstDiscoveryOrder: number;
}

/**
 * Detached cache copy of a canonical record. Holds no reference to a store
 * row; `lookup` is the identifier used to re-resolve it.
 */
export interface RecordSnapshot extends CanonicalRecord {
  readonly lookup: Identifier;
}

/** A live, store-backed audiobook row. */
export interface StoredAudiobook {
  id: RecordId;
  primaryId: string | null;
  isbn10: string | null;
  isbn13: string | null;
  title: string;
  subtitle: string | null;
  authors: string[];
  narrators: string[];
  coverUrl: string | null;
  runtimeMinutes: number | null;
  publishDate: string | null;
  source: RecordSource;
  updatedAt: string;
}

// ── Store contract ──────────────────────────────────────────────────────────

/**
 * Persistent store collaborator. Owns the durable representation of a book.
 */
export interface AudiobookStore {
  /**
   * Batch-resolve identifiers. Identifiers with no matching row are simply
   * absent from the returned map.
   */
  fetchByIdentifierSet(
    ids: readonly Identifier[],
  ): Promise<Map<IdentifierKey, StoredAudiobook>>;

  /** Insert or update the row matching the record's identifiers. */
  upsert(record: CanonicalRecord): Promise<StoredAudiobook>;

  deleteByIdentifier(id: Identifier): Promise<StoredAudiobook | null>;

  /** Remove rows last updated before `olderThan`; returns what was removed. */
  pruneStale(olderThan: Date): Promise<StoredAudiobook[]>;
}

// ── Source contract ─────────────────────────────────────────────────────────

export interface SourceCallContext {
  region: Region;
  signal?: AbortSignal;
}

/** Capability interface implemented once per upstream catalog. */
export interface CatalogSource {
  readonly name: SourceName;

  /** Whether `lookupByIdentifier` understands this identifier kind. */
  supports(kind: IdentifierKind): boolean;

  searchByText(
    query: string,
    limit: number,
    ctx: SourceCallContext,
  ): Promise<SourceHit[]>;

  /** `null` means "not found" and is not an error. */
  lookupByIdentifier(
    id: Identifier,
    ctx: SourceCallContext,
  ): Promise<SourceHit | null>;
}

/** Type-ahead title suggestions. */
export interface SuggestionProvider {
  suggest(query: string, ctx: SourceCallContext): Promise<string[]>;
}

// ── Aggregation & search results ────────────────────────────────────────────

export interface SourceFailure {
  source: SourceName;
  operation: "search" | "lookup";
  /** The query variant, or the identifier value for lookups. */
  input: string;
  kind: FailureKind;
  message: string;
  timestamp: string;
}

export interface AggregationResult {
  candidates: Candidate[];
  variants: string[];
  variantsIssued: number;
  shortCircuited: boolean;
  directLookup: boolean;
  deadlineExceeded: boolean;
  callsAttempted: number;
  failures: SourceFailure[];
}

export interface SearchRequest {
  query: string;
  limit?: number;
  region?: Region;
  signal?: AbortSignal;
}

export interface SearchResponse {
  searchId: string;
  query: string;
  normalizedQuery: string;
  region: Region;
  limit: number;
  results: StoredAudiobook[];
  fromCache: boolean;
  directLookup: boolean;
  variantsIssued: number;
  shortCircuited: boolean;
  failures: SourceFailure[];
  isPartial: boolean;
  /** Merged records left out because they carry no identifier to store them by. */
  skippedWithoutIdentifier: number;
  startedAt: string;
  completedAt: string;
}

// ── Source registry file ────────────────────────────────────────────────────

export interface SourceDefinition {
  name: SourceName;
  enabled: boolean;
  baseUrl: string;
  /** Ordered identifier-lookup endpoints (first hit wins). */
  lookupUrls: string[];
  /** Name of the env var holding an API key, resolved at startup. */
  apiKeyEnvVar?: string;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production" | "test";
  port: number;
  logLevel: string;
  sourcesFile: string;
  /** Overrides the YAML order when non-empty. */
  sourcePriority: SourceName[];
  search: SearchConfig;
  cache: CacheConfig;
  metrics: MetricsConfig;
  store: StoreConfig;
}

export interface SearchConfig {
  perSourceLimit: number;
  sufficientCount: number;
  perCallTimeoutMs: number;
  passTimeoutMs: number;
  maxConcurrency: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxCrossReferenceLookups: number;
  defaultResultLimit: number;
  maxResultLimit: number;
  defaultRegion: Region;
}

export interface CacheConfig {
  enabled: boolean;
  maxEntries: number;
  cacheTtlSeconds: number;
  sweepIntervalMs: number;
  suggestionTtlSeconds: number;
}

export interface MetricsConfig {
  enabled: boolean;
  reportIntervalMs: number;
}

export interface StoreConfig {
  /** PostgreSQL connection string; `null` selects the in-memory store. */
  databaseUrl: string | null;
  staleAfterSeconds: number;
  janitorIntervalMs: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
