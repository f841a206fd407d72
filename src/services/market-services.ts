import type { FastifyBaseLogger } from 'fastify';
import type { Env } from '../util/env.js';
import { MarketAnalyzer } from './analysis.js';
import { CatalogCache } from './catalog-cache.js';
import { fetchTopCoins, searchListings } from './coingecko-client.js';
import type { TopCoin } from './coingecko-client.types.js';
import { HttpClient } from './http-client.js';
import type { HttpClientOptions } from './http-client.types.js';
import { getMarketProvider } from './market-provider.js';
import type {
  CoinSearchHit,
  MarketDataProvider,
} from './market-provider.types.js';
import { NewsClient } from './news.js';
import { SeriesFetcher } from './series-fetcher.js';
import { SymbolResolver } from './symbol-resolver.js';

export interface CoinListings {
  top(limit?: number): Promise<TopCoin[]>;
  search(query: string, limit?: number): Promise<CoinSearchHit[]>;
}

export interface MarketServices {
  provider: MarketDataProvider;
  catalog: CatalogCache;
  resolver: SymbolResolver;
  series: SeriesFetcher;
  analyzer: MarketAnalyzer;
  listings: CoinListings;
}

export type MarketServicesConfig = Pick<
  Env,
  | 'MARKET_PROVIDER'
  | 'BINANCE_API_URL'
  | 'COINGECKO_API_URL'
  | 'CRYPTOCOMPARE_API_URL'
  | 'CRYPTOPANIC_API_URL'
  | 'CRYPTOPANIC_API_KEY'
  | 'FETCH_TIMEOUT_MS'
  | 'FETCH_MAX_RETRIES'
  | 'ANALYSIS_WINDOW_DAYS'
  | 'ANALYSIS_DEADLINE_MS'
  | 'CATALOG_FAILURE_COOLDOWN_MS'
>;

export function createMarketServices(
  config: MarketServicesConfig,
  log: FastifyBaseLogger,
  httpOptions: Omit<HttpClientOptions, 'maxRetries' | 'timeoutMs'> = {},
): MarketServices {
  const http = new HttpClient(log.child({ component: 'http' }), {
    ...httpOptions,
    maxRetries: config.FETCH_MAX_RETRIES,
    timeoutMs: config.FETCH_TIMEOUT_MS,
  });
  const provider = getMarketProvider(config.MARKET_PROVIDER, {
    http,
    binanceUrl: config.BINANCE_API_URL,
    coingeckoUrl: config.COINGECKO_API_URL,
  });
  const catalog = new CatalogCache(
    () => provider.fetchCatalog(),
    log.child({ component: 'catalog', provider: provider.name }),
    { failureCooldownMs: config.CATALOG_FAILURE_COOLDOWN_MS },
  );
  const resolver = new SymbolResolver(
    provider,
    catalog,
    log.child({ component: 'resolver' }),
  );
  const series = new SeriesFetcher(
    provider,
    catalog,
    log.child({ component: 'series' }),
  );
  const news = new NewsClient(
    http,
    {
      cryptoCompareUrl: config.CRYPTOCOMPARE_API_URL,
      cryptoPanicUrl: config.CRYPTOPANIC_API_URL,
      ...(config.CRYPTOPANIC_API_KEY
        ? { cryptoPanicKey: config.CRYPTOPANIC_API_KEY }
        : {}),
    },
    log.child({ component: 'news' }),
  );
  const analyzer = new MarketAnalyzer({
    resolver,
    series,
    news,
    log: log.child({ component: 'analysis' }),
    windowDays: config.ANALYSIS_WINDOW_DAYS,
    deadlineMs: config.ANALYSIS_DEADLINE_MS,
  });
  const listings: CoinListings = {
    top: (limit) => fetchTopCoins(http, config.COINGECKO_API_URL, limit),
    search: (query, limit) =>
      searchListings(http, config.COINGECKO_API_URL, query, limit),
  };

  return { provider, catalog, resolver, series, analyzer, listings };
}
