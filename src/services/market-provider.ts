import {
  KLINE_LIMIT_MAX,
  fetchExchangeSymbols,
  fetchKlines,
} from './binance-client.js';
import {
  fetchCoin,
  fetchCoinIds,
  fetchMarketChart,
  searchCoins,
} from './coingecko-client.js';
import type { HttpClient } from './http-client.js';
import type {
  MarketDataProvider,
  SupportedMarketProvider,
} from './market-provider.types.js';
import { matchTradingPair } from './symbol-resolver.js';

export interface MarketProviderConfig {
  http: HttpClient;
  binanceUrl: string;
  coingeckoUrl: string;
}

const HOURS_PER_DAY = 24;

/**
 * Exchange-direct variant: pairs and hourly klines from the exchange. The
 * exchange has no coin directory, so lookup and search go to the aggregator.
 */
export function createBinanceProvider({
  http,
  binanceUrl,
  coingeckoUrl,
}: MarketProviderConfig): MarketDataProvider {
  return {
    name: 'binance',
    fetchCatalog() {
      return fetchExchangeSymbols(http, binanceUrl);
    },
    marketIdFor(symbol, catalog) {
      return matchTradingPair(symbol.symbol, catalog);
    },
    matchPair(input, catalog) {
      return matchTradingPair(input, catalog);
    },
    fetchSeries(marketId, windowDays) {
      const limit = Math.min(windowDays * HOURS_PER_DAY, KLINE_LIMIT_MAX);
      return fetchKlines(http, binanceUrl, marketId, '1h', limit);
    },
    lookupCoin(id) {
      return fetchCoin(http, coingeckoUrl, id);
    },
    searchCoins(query) {
      return searchCoins(http, coingeckoUrl, query);
    },
  };
}

/**
 * Aggregator-direct variant: coin ids and point-price history as proxy candles.
 * It lists no trading pairs, so pair-form resolution is unsupported.
 */
export function createCoingeckoProvider({
  http,
  coingeckoUrl,
}: MarketProviderConfig): MarketDataProvider {
  return {
    name: 'coingecko',
    fetchCatalog() {
      return fetchCoinIds(http, coingeckoUrl);
    },
    marketIdFor(symbol, catalog) {
      // an unknown catalog cannot veto an id the lookup already returned
      if (catalog.size === 0 || catalog.has(symbol.id)) return symbol.id;
      return null;
    },
    fetchSeries(marketId, windowDays) {
      return fetchMarketChart(http, coingeckoUrl, marketId, windowDays);
    },
    lookupCoin(id) {
      return fetchCoin(http, coingeckoUrl, id);
    },
    searchCoins(query) {
      return searchCoins(http, coingeckoUrl, query);
    },
  };
}

export function getMarketProvider(
  provider: SupportedMarketProvider,
  config: MarketProviderConfig,
): MarketDataProvider {
  switch (provider) {
    case 'binance':
      return createBinanceProvider(config);
    case 'coingecko':
      return createCoingeckoProvider(config);
    default:
      throw new Error(`unsupported market provider: ${String(provider)}`);
  }
}
