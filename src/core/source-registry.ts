// ---------------------------------------------------------------------------
// Source Registry – catalog sources in configured priority order.
// ---------------------------------------------------------------------------

import { IdentifierKind } from "./types.js";
import type { CatalogSource, SourceName } from "./types.js";
import { ConfigurationError } from "./errors.js";

/**
 * Holds the catalog sources in priority order. The first entry is the
 * *primary* catalog: it drives the short-circuit count and answers
 * primary-id lookups. Priority also decides which source wins a field
 * conflict during merge.
 *
 * Construction fails with {@link ConfigurationError} when the priority list
 * is empty, repeats a name, names a source that was not supplied, or puts a
 * source that cannot resolve primary ids first.
 */
export class SourceRegistry {
  private readonly ordered: CatalogSource[];
  private readonly indexByName = new Map<SourceName, number>();

  constructor(sources: readonly CatalogSource[], priority: readonly SourceName[]) {
    if (priority.length === 0) {
      throw new ConfigurationError("sourcePriority must name at least one source");
    }

    const byName = new Map<SourceName, CatalogSource>();
    for (const source of sources) byName.set(source.name, source);

    this.ordered = [];
    for (const name of priority) {
      if (this.indexByName.has(name)) {
        throw new ConfigurationError(`sourcePriority lists "${name}" more than once`);
      }
      const source = byName.get(name);
      if (!source) {
        throw new ConfigurationError(`sourcePriority names unknown or disabled source "${name}"`);
      }
      this.indexByName.set(name, this.ordered.length);
      this.ordered.push(source);
    }

    if (!this.primary.supports(IdentifierKind.PRIMARY_ID)) {
      throw new ConfigurationError(
        `Primary source "${this.primary.name}" cannot look up catalog ids`,
      );
    }
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  get primary(): CatalogSource {
    const [first] = this.ordered;
    if (!first) throw new ConfigurationError("No sources registered");
    return first;
  }

  /** Every source after the primary, in priority order. */
  get secondaries(): CatalogSource[] {
    return this.ordered.slice(1);
  }

  /** All sources in priority order. */
  all(): CatalogSource[] {
    return [...this.ordered];
  }

  get priority(): SourceName[] {
    return this.ordered.map((s) => s.name);
  }

  /** Position in the priority list; unknown names sort last. */
  priorityOf(name: SourceName): number {
    return this.indexByName.get(name) ?? this.ordered.length;
  }

  get(name: SourceName): CatalogSource | null {
    const index = this.indexByName.get(name);
    return index === undefined ? null : (this.ordered[index] ?? null);
  }

  get size(): number {
    return this.ordered.length;
  }
}
