// ---------------------------------------------------------------------------
// Search aggregator: fans query variants out across catalog sources.
// ---------------------------------------------------------------------------

import type pino from "pino";

import { FailureKind, IdentifierKind } from "../core/types.js";
import type {
  AggregationResult,
  Candidate,
  CatalogSource,
  Identifier,
  IdentifierKey,
  Region,
  SourceFailure,
  SourceHit,
  SourceName,
} from "../core/types.js";
import type { SourceRegistry } from "../core/source-registry.js";
import type { HealthTracker } from "../cache/health-tracker.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import {
  SearchCancelledError,
  SourceParseError,
  SourceTimeoutError,
  SourceUnavailableError,
} from "../core/errors.js";
import {
  classifyIdentifier,
  directLookupIdentifier,
  equivalentIdentifiers,
  identifierKey,
  unionIdentifiers,
} from "../domain/identifier/identifier.js";
import { expandQuery } from "../domain/query/query-expander.js";
import { abortable } from "./concurrency.js";
import type { ConcurrencyPool } from "./concurrency.js";
import { withRetry } from "./retry.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface AggregatorOptions {
  perCallTimeoutMs: number;
  passTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface AggregateParams {
  perSourceLimit: number;
  sufficientCount: number;
  region: Region;
  signal?: AbortSignal;
}

export interface LookupContext {
  region: Region;
  signal?: AbortSignal;
  /** Receives failures of the individual source calls. */
  failures?: SourceFailure[];
}

type CallOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: SourceFailure };

/** Signal scope for one aggregation pass. */
interface PassScope {
  signal: AbortSignal;
  deadlineReached(): boolean;
  close(): void;
}

// ── SearchAggregator ───────────────────────────────────────────────────────

/**
 * Runs one aggregation pass for a query.
 *
 * - A query shaped like a catalog id (or an ISBN that could be one) is first
 *   tried as a direct lookup; a hit ends the pass.
 * - Otherwise each query variant goes to the primary source first. Once the
 *   primary alone has produced `sufficientCount` distinct identities the pass
 *   stops; until then every secondary source is queried concurrently for the
 *   same variant.
 * - Every call runs in the shared pool, with a per-call timeout and retry on
 *   transient failures. Failures become {@link SourceFailure} entries and
 *   never abort the pass.
 * - The pass deadline stops further variants and aborts in-flight calls;
 *   completed work is still returned.
 * - Caller cancellation throws {@link SearchCancelledError}.
 */
export class SearchAggregator {
  constructor(
    private readonly registry: SourceRegistry,
    private readonly pool: ConcurrencyPool,
    private readonly healthTracker: HealthTracker,
    private readonly metrics: MetricsCollector,
    private readonly options: AggregatorOptions,
    private readonly logger: pino.Logger,
  ) {}

  // ── Public API ───────────────────────────────────────────────────────────

  async search(query: string, params: AggregateParams): Promise<AggregationResult> {
    const variants = expandQuery(query);
    const result: AggregationResult = {
      candidates: [],
      variants,
      variantsIssued: 0,
      shortCircuited: false,
      directLookup: false,
      deadlineExceeded: false,
      callsAttempted: 0,
      failures: [],
    };
    if (variants.length === 0) return result;

    this.throwIfCancelled(query, params.signal);

    const pass = this.openPass(params.signal);
    const buckets = new Map<SourceName, Candidate[]>();

    try {
      // 1. Direct identifier path
      const direct = directLookupIdentifier(query);
      if (direct) {
        const hit = await this.lookupAcrossSources(direct, params.region, pass.signal, result);
        this.throwIfCancelled(query, params.signal);

        if (hit) {
          const queryId = classifyIdentifier(query.trim().replace(/-/g, ""));
          const queryForms = queryId ? equivalentIdentifiers(queryId) : [];
          result.directLookup = true;
          result.candidates = [
            {
              ...hit,
              identifiers: unionIdentifiers(hit.identifiers, queryForms),
              variantIndex: 0,
              rankPosition: 0,
            },
          ];
          this.logger.info({ query, identifier: direct.value }, "direct lookup hit");
          return result;
        }
        this.logger.debug({ query }, "direct lookup missed, expanding query");
      }

      // 2. Variant fan-out
      const primary = this.registry.primary;
      const primaryIdentities = new Set<IdentifierKey>();

      for (let variantIndex = 0; variantIndex < variants.length; variantIndex++) {
        if (pass.signal.aborted) break;
        const variant = variants[variantIndex] ?? "";
        result.variantsIssued++;

        const primaryOutcome = await this.searchSource(primary, variant, params, pass, result);
        this.throwIfCancelled(query, params.signal);

        if (primaryOutcome.ok) {
          const stamped = stamp(primaryOutcome.value, variantIndex);
          append(buckets, primary.name, stamped);
          for (const hit of stamped) {
            const identity = identityOf(hit);
            if (identity) primaryIdentities.add(identity);
          }
        }

        if (primaryIdentities.size >= params.sufficientCount) {
          result.shortCircuited = true;
          break;
        }
        if (pass.signal.aborted) break;

        const secondaries = this.registry.secondaries;
        const outcomes = await Promise.all(
          secondaries.map((source) => this.searchSource(source, variant, params, pass, result)),
        );
        this.throwIfCancelled(query, params.signal);

        outcomes.forEach((outcome, i) => {
          const source = secondaries[i];
          if (outcome.ok && source) {
            append(buckets, source.name, stamp(outcome.value, variantIndex));
          }
        });
      }

      result.deadlineExceeded = pass.deadlineReached();
    } finally {
      pass.close();
    }

    // Insertion order: source priority, then variant, then in-source rank.
    for (const source of this.registry.all()) {
      const bucket = buckets.get(source.name) ?? [];
      bucket.sort((a, b) => a.variantIndex - b.variantIndex || a.rankPosition - b.rankPosition);
      result.candidates.push(...bucket);
    }

    if (result.deadlineExceeded) {
      this.logger.warn(
        { query, variantsIssued: result.variantsIssued, candidates: result.candidates.length },
        "search pass deadline exceeded; returning partial candidates",
      );
    }

    return result;
  }

  /**
   * Ask each source that understands the identifier's kind, in priority
   * order, and return the first hit. Misses and failures move on to the
   * next source.
   */
  async lookupByIdentifier(id: Identifier, ctx: LookupContext): Promise<SourceHit | null> {
    const sink = { failures: ctx.failures ?? [], callsAttempted: 0 };
    return this.lookupAcrossSources(id, ctx.region, ctx.signal, sink);
  }

  // ── Private helpers ────────────────────────────────────────────────────

  private async lookupAcrossSources(
    id: Identifier,
    region: Region,
    signal: AbortSignal | undefined,
    sink: { failures: SourceFailure[]; callsAttempted: number },
  ): Promise<SourceHit | null> {
    for (const source of this.registry.all()) {
      if (!source.supports(id.kind)) continue;
      if (signal?.aborted) return null;

      sink.callsAttempted++;
      const outcome = await this.callSource(source, "lookup", id.value, signal, (callSignal) =>
        source.lookupByIdentifier(id, { region, signal: callSignal }),
      );

      if (!outcome.ok) {
        sink.failures.push(outcome.failure);
        continue;
      }
      if (outcome.value) return outcome.value;
    }
    return null;
  }

  private searchSource(
    source: CatalogSource,
    variant: string,
    params: AggregateParams,
    pass: PassScope,
    result: AggregationResult,
  ): Promise<CallOutcome<SourceHit[]>> {
    result.callsAttempted++;
    return this.callSource(source, "search", variant, pass.signal, (callSignal) =>
      source.searchByText(variant, params.perSourceLimit, {
        region: params.region,
        signal: callSignal,
      }),
    ).then((outcome) => {
      if (!outcome.ok) result.failures.push(outcome.failure);
      return outcome;
    });
  }

  /**
   * One source call inside the pool, with per-call timeout and retry.
   * Never rejects: failures come back as a {@link SourceFailure}.
   */
  private async callSource<T>(
    source: CatalogSource,
    operation: "search" | "lookup",
    input: string,
    parentSignal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<CallOutcome<T>> {
    const start = performance.now();

    try {
      const value = await this.pool.run(
        () =>
          withRetry(
            () => {
              const timeout = AbortSignal.timeout(this.options.perCallTimeoutMs);
              const signal = parentSignal ? AbortSignal.any([parentSignal, timeout]) : timeout;
              return abortable(Promise.resolve().then(() => fn(signal)), signal);
            },
            {
              maxRetries: this.options.maxRetries,
              baseDelayMs: this.options.retryBaseDelayMs,
              signal: parentSignal,
            },
          ),
        parentSignal,
      );

      const durationMs = Math.round(performance.now() - start);
      this.healthTracker.recordSuccess(source.name, durationMs);
      this.metrics.recordSourceCall(source.name, operation, "success", durationMs);
      return { ok: true, value };
    } catch (error: unknown) {
      const durationMs = Math.round(performance.now() - start);
      const kind = classifyFailure(error);
      const message = error instanceof Error ? error.message : String(error);

      if (parentSignal?.aborted) {
        // Abandoned with its pass; not counted against the source.
        this.logger.debug(
          { source: source.name, operation, input, durationMs },
          "source call abandoned with its pass",
        );
      } else {
        this.healthTracker.recordFailure(source.name, kind, message, durationMs);
        this.metrics.recordSourceCall(
          source.name,
          operation,
          kind === FailureKind.TIMEOUT ? "timeout" : "failure",
          durationMs,
        );
        this.logger.warn(
          { source: source.name, operation, input, kind, durationMs, err: error },
          "source call failed",
        );
      }

      return {
        ok: false,
        failure: {
          source: source.name,
          operation,
          input,
          kind,
          message,
          timestamp: new Date().toISOString(),
        },
      };
    }
  }

  private openPass(callerSignal: AbortSignal | undefined): PassScope {
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(new DOMException("Search pass deadline exceeded", "TimeoutError"));
    }, this.options.passTimeoutMs);
    timer.unref();

    return {
      signal: callerSignal ? AbortSignal.any([callerSignal, deadline.signal]) : deadline.signal,
      deadlineReached: () => deadline.signal.aborted,
      close: () => clearTimeout(timer),
    };
  }

  private throwIfCancelled(query: string, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new SearchCancelledError(query, { cause: signal.reason });
    }
  }
}

// ── Module helpers ─────────────────────────────────────────────────────────

function stamp(hits: SourceHit[], variantIndex: number): Candidate[] {
  return hits.map((hit, rankPosition) => ({ ...hit, variantIndex, rankPosition }));
}

function append(buckets: Map<SourceName, Candidate[]>, source: SourceName, items: Candidate[]): void {
  const bucket = buckets.get(source);
  if (bucket) bucket.push(...items);
  else buckets.set(source, [...items]);
}

/** A hit's identity for the short-circuit count: its primary id if any. */
function identityOf(hit: SourceHit): IdentifierKey | null {
  const id = hit.identifiers.find((i) => i.kind === IdentifierKind.PRIMARY_ID) ?? hit.identifiers[0];
  return id ? identifierKey(id) : null;
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof SourceTimeoutError) return FailureKind.TIMEOUT;
  if (
    error instanceof DOMException &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  ) {
    return FailureKind.TIMEOUT;
  }
  if (error instanceof SourceUnavailableError) return FailureKind.UNAVAILABLE;
  if (error instanceof SourceParseError) return FailureKind.PARSE;
  return FailureKind.UNKNOWN;
}
