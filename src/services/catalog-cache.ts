import type { FastifyBaseLogger } from 'fastify';

const EMPTY_CATALOG: ReadonlySet<string> = new Set<string>();

export const CATALOG_UNAVAILABLE = 'market catalog could not be loaded';

export interface CatalogCacheOptions {
  /** how long a failed population is remembered before the next fetch */
  failureCooldownMs?: number;
  now?: () => number;
}

/**
 * Lazily loaded set of identifiers accepted by a market provider.
 *
 * Population is single-flight: concurrent callers share one pending load.
 * A failed load yields an empty set; callers check `isPopulated` to tell an
 * unknown catalog from one that lacks the symbol.
 */
export class CatalogCache {
  private catalog: ReadonlySet<string> | null = null;
  private pending: Promise<ReadonlySet<string>> | null = null;
  private failedAt: number | null = null;
  private readonly failureCooldownMs: number;
  private readonly now: () => number;

  constructor(
    private readonly load: () => Promise<string[]>,
    private readonly log: FastifyBaseLogger,
    opts: CatalogCacheOptions = {},
  ) {
    this.failureCooldownMs = opts.failureCooldownMs ?? 60_000;
    this.now = opts.now ?? Date.now;
  }

  get(): Promise<ReadonlySet<string>> {
    if (this.catalog) return Promise.resolve(this.catalog);
    if (this.pending) return this.pending;
    if (
      this.failedAt !== null &&
      this.now() - this.failedAt < this.failureCooldownMs
    ) {
      return Promise.resolve(EMPTY_CATALOG);
    }
    return this.populate(EMPTY_CATALOG);
  }

  /** Re-fetches the catalog; the current set stays in place if the fetch fails. */
  refresh(): Promise<ReadonlySet<string>> {
    if (this.pending) return this.pending;
    return this.populate(this.catalog ?? EMPTY_CATALOG);
  }

  get isPopulated(): boolean {
    return this.catalog !== null;
  }

  private populate(
    fallback: ReadonlySet<string>,
  ): Promise<ReadonlySet<string>> {
    const pending = this.load()
      .then((ids) => {
        const catalog: ReadonlySet<string> = new Set(ids);
        this.catalog = catalog;
        this.failedAt = null;
        this.log.info({ size: catalog.size }, 'catalog loaded');
        return catalog;
      })
      .catch((err: unknown) => {
        if (!this.catalog) this.failedAt = this.now();
        this.log.error({ err }, 'failed to load catalog');
        return fallback;
      })
      .finally(() => {
        this.pending = null;
      });
    this.pending = pending;
    return pending;
  }
}
