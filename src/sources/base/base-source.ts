// ---------------------------------------------------------------------------
// BaseSource – abstract base class shared by every catalog source.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { z } from "zod";

import type {
  CatalogSource,
  Identifier,
  IdentifierKind,
  SourceCallContext,
  SourceDefinition,
  SourceHit,
  SourceName,
} from "../../core/types.js";
import {
  SourceError,
  SourceParseError,
  SourceTimeoutError,
  SourceUnavailableError,
} from "../../core/errors.js";

const USER_AGENT = "audiobook-locator/0.1";

type Operation = "search" | "lookup" | "suggest";

/**
 * Abstract base implementing the {@link CatalogSource} contract. Concrete
 * sources provide {@link executeSearch} and {@link executeLookup}.
 *
 * The base class provides:
 *   - Response-time measurement and logging around every call.
 *   - Consistent error wrapping into the `SourceError` family.
 *   - A validated JSON fetch helper.
 */
export abstract class BaseSource implements CatalogSource {
  public readonly name: SourceName;

  protected readonly definition: SourceDefinition;
  protected readonly logger: Logger;

  constructor(definition: SourceDefinition, logger: Logger) {
    this.definition = definition;
    this.name = definition.name;
    this.logger = logger.child({ source: definition.name });
  }

  // ── Public interface ────────────────────────────────────────────────────

  abstract supports(kind: IdentifierKind): boolean;

  async searchByText(
    query: string,
    limit: number,
    ctx: SourceCallContext,
  ): Promise<SourceHit[]> {
    const hits = await this.measure("search", query, () =>
      this.executeSearch(query, limit, ctx),
    );
    return hits.slice(0, limit);
  }

  async lookupByIdentifier(
    id: Identifier,
    ctx: SourceCallContext,
  ): Promise<SourceHit | null> {
    if (!this.supports(id.kind)) return null;
    return this.measure("lookup", id.value, () => this.executeLookup(id, ctx));
  }

  // ── Abstract methods for subclasses ─────────────────────────────────────

  protected abstract executeSearch(
    query: string,
    limit: number,
    ctx: SourceCallContext,
  ): Promise<SourceHit[]>;

  protected abstract executeLookup(
    id: Identifier,
    ctx: SourceCallContext,
  ): Promise<SourceHit | null>;

  // ── Protected helpers ───────────────────────────────────────────────────

  /**
   * Run `fn`, logging its duration and wrapping any failure into a
   * {@link SourceError}.
   */
  protected async measure<T>(
    operation: Operation,
    input: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    const start = performance.now();

    try {
      const result = await fn();
      const responseTimeMs = Math.round(performance.now() - start);
      this.logger.debug({ operation, input, responseTimeMs }, "Source call completed");
      return result;
    } catch (error: unknown) {
      const responseTimeMs = Math.round(performance.now() - start);
      const wrapped = this.wrapError(error, `${operation} "${input}"`);
      this.logger.debug(
        { operation, input, responseTimeMs, err: wrapped },
        "Source call failed",
      );
      throw wrapped;
    }
  }

  protected wrapError(error: unknown, description: string): SourceError {
    if (error instanceof SourceError) return error;

    if (
      error instanceof DOMException &&
      (error.name === "AbortError" || error.name === "TimeoutError")
    ) {
      return new SourceTimeoutError(
        `${description} was aborted`,
        this.name,
        { cause: error },
      );
    }

    if (error instanceof z.ZodError || error instanceof SyntaxError) {
      return new SourceParseError(
        `Unexpected response for ${description}: ${error.message}`,
        this.name,
        { cause: error },
      );
    }

    // fetch reports network failures as TypeError.
    if (error instanceof TypeError) {
      return new SourceUnavailableError(
        `Network error during ${description}: ${error.message}`,
        this.name,
        null,
        { cause: error },
      );
    }

    const msg = error instanceof Error ? error.message : "Unknown error";
    return new SourceError(`${description} failed: ${msg}`, this.name, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  /**
   * GET `url` and validate the JSON body against `schema`. A 404 resolves
   * to `null`; any other non-2xx status throws
   * {@link SourceUnavailableError}.
   */
  protected async getJson<T>(
    url: URL,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<T | null> {
    const response = await fetch(url.toString(), {
      headers: {
        "user-agent": USER_AGENT,
        accept: "application/json",
      },
      signal,
    });

    if (response.status === 404) return null;

    if (!response.ok) {
      throw new SourceUnavailableError(
        `${url.hostname} returned HTTP ${response.status}`,
        this.name,
        response.status,
      );
    }

    const body: unknown = await response.json();
    return schema.parse(body);
  }

  /** Trim an ISO timestamp to its date part; pass other shapes through. */
  protected normalizeDate(raw: string | number | null | undefined): string | null {
    if (raw === null || raw === undefined || raw === "") return null;
    const text = String(raw).trim();
    const isoDate = /^\d{4}-\d{2}-\d{2}/.exec(text);
    return isoDate ? isoDate[0] : text;
  }
}
