import type { FastifyBaseLogger } from 'fastify';
import { CATALOG_UNAVAILABLE, type CatalogCache } from './catalog-cache.js';
import { isFetchError } from './http-client.js';
import type {
  CandidateSuggestion,
  MarketDataProvider,
  ResolvedSymbol,
} from './market-provider.types.js';
import type {
  PairResolution,
  ResolutionOutcome,
} from './symbol-resolver.types.js';

export const QUOTE_PRIORITY = ['USDT', 'BTC'] as const;
export const MAX_SUGGESTIONS = 5;

export function normalizePairInput(input: string): string {
  return input.trim().toUpperCase().replace(/[/-]/g, '');
}

/** First `{base}{quote}` pair present in the catalog, in quote priority order. */
export function matchTradingPair(
  input: string,
  catalog: ReadonlySet<string>,
): string | null {
  const base = normalizePairInput(input);
  if (!base) return null;
  for (const quote of QUOTE_PRIORITY) {
    const pair = `${base}${quote}`;
    if (catalog.has(pair)) return pair;
  }
  return null;
}

export class SymbolResolver {
  constructor(
    private readonly provider: MarketDataProvider,
    private readonly catalog: CatalogCache,
    private readonly log: FastifyBaseLogger,
  ) {}

  async resolvePair(input: string): Promise<PairResolution> {
    if (!this.provider.matchPair) {
      return { kind: 'unsupported', provider: this.provider.name };
    }
    const catalog = await this.catalog.get();
    const pair = this.provider.matchPair(input, catalog);
    if (!pair) {
      if (!this.catalog.isPopulated) {
        this.log.warn({ input }, 'pair lookup skipped, catalog unavailable');
        return { kind: 'unavailable', message: CATALOG_UNAVAILABLE };
      }
      this.log.info({ input, catalogSize: catalog.size }, 'no trading pair found');
      return { kind: 'not_found', suggestions: [] };
    }
    const base = normalizePairInput(input);
    return {
      kind: 'resolved',
      symbol: { id: pair, symbol: base, name: `${base}/${pair.slice(base.length)}` },
    };
  }

  async resolveCoin(input: string): Promise<ResolutionOutcome> {
    const query = input.trim();
    if (!query) return { kind: 'not_found', suggestions: [] };

    const direct = await this.lookup(query.toLowerCase());
    if (direct) return { kind: 'resolved', symbol: direct };

    let hits: CandidateSuggestion[];
    try {
      hits = await this.provider.searchCoins(query);
    } catch (err) {
      this.log.error({ err, input: query }, 'coin search failed');
      if (isFetchError(err)) return { kind: 'unavailable', message: err.message };
      throw err;
    }
    if (!hits.length) return { kind: 'not_found', suggestions: [] };

    const wanted = query.toUpperCase();
    const exact = hits.find((hit) => hit.symbol.toUpperCase() === wanted);
    if (exact) {
      return {
        kind: 'resolved',
        symbol: { id: exact.id, symbol: exact.symbol.toUpperCase(), name: exact.name },
      };
    }

    return {
      kind: 'ambiguous',
      suggestions: hits.slice(0, MAX_SUGGESTIONS).map(({ id, symbol, name }) => ({
        id,
        symbol,
        name,
      })),
    };
  }

  private async lookup(id: string): Promise<ResolvedSymbol | null> {
    try {
      return await this.provider.lookupCoin(id);
    } catch (err) {
      if (!isFetchError(err)) throw err;
      this.log.warn({ err, id }, 'coin lookup failed, falling back to search');
      return null;
    }
  }
}
