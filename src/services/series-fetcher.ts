import type { FastifyBaseLogger } from 'fastify';
import { CATALOG_UNAVAILABLE, type CatalogCache } from './catalog-cache.js';
import { type FetchError, isFetchError } from './http-client.js';
import type {
  MarketDataProvider,
  OhlcvSample,
  ResolvedSymbol,
} from './market-provider.types.js';

export const DEFAULT_WINDOW_DAYS = 30;

export type SeriesFailure =
  | { kind: 'catalog_unavailable'; message: string }
  | { kind: 'upstream'; message: string; error: FetchError };

export interface SeriesResult {
  marketId: string | null;
  /** empty when the market is unknown or the upstream call failed */
  samples: OhlcvSample[];
  failure?: SeriesFailure;
}

export class SeriesFetcher {
  constructor(
    private readonly provider: MarketDataProvider,
    private readonly catalog: CatalogCache,
    private readonly log: FastifyBaseLogger,
  ) {}

  async fetchSeries(
    symbol: ResolvedSymbol,
    windowDays: number = DEFAULT_WINDOW_DAYS,
  ): Promise<SeriesResult> {
    const catalog = await this.catalog.get();
    const marketId = this.provider.marketIdFor(symbol, catalog);
    if (!marketId) {
      if (!this.catalog.isPopulated) {
        this.log.warn(
          { symbol: symbol.symbol, provider: this.provider.name },
          'cannot map symbol to a market, catalog unavailable',
        );
        return {
          marketId: null,
          samples: [],
          failure: { kind: 'catalog_unavailable', message: CATALOG_UNAVAILABLE },
        };
      }
      this.log.warn(
        { symbol: symbol.symbol, provider: this.provider.name },
        'no market found for symbol',
      );
      return { marketId: null, samples: [] };
    }

    try {
      const samples = await this.provider.fetchSeries(marketId, windowDays);
      this.log.info(
        { marketId, windowDays, samples: samples.length },
        'fetched price series',
      );
      return { marketId, samples };
    } catch (err) {
      if (!isFetchError(err)) throw err;
      this.log.error({ err, marketId }, 'failed to fetch price series');
      return {
        marketId,
        samples: [],
        failure: { kind: 'upstream', message: err.message, error: err },
      };
    }
  }
}
