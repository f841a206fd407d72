import pino from 'pino';
import { vi } from 'vitest';
import type { FastifyBaseLogger } from 'fastify';
import { MarketAnalyzer } from '../src/services/analysis.js';
import { CatalogCache } from '../src/services/catalog-cache.js';
import type { MarketServices } from '../src/services/market-services.js';
import type {
  CoinSearchHit,
  MarketDataProvider,
  OhlcvSample,
  ResolvedSymbol,
} from '../src/services/market-provider.types.js';
import { SeriesFetcher } from '../src/services/series-fetcher.js';
import { SymbolResolver, matchTradingPair } from '../src/services/symbol-resolver.js';

const HOUR_MS = 60 * 60 * 1000;

export function mockLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

export interface SampleConfig {
  closeStart?: number;
  closeStep?: number;
  volumeStart?: number;
  volumeStep?: number;
  startTime?: number;
}

export function buildSamples(count: number, config: SampleConfig = {}): OhlcvSample[] {
  const {
    closeStart = 100,
    closeStep = 1,
    volumeStart = 1_000,
    volumeStep = 10,
    startTime = Date.UTC(2025, 0, 1),
  } = config;
  return Array.from({ length: count }, (_, idx) => {
    const close = closeStart + closeStep * idx;
    const volume = volumeStart + volumeStep * idx;
    const openTime = startTime + idx * HOUR_MS;
    return {
      openTime,
      open: close,
      high: close,
      low: close,
      close,
      volume,
      closeTime: openTime + HOUR_MS - 1,
      quoteVolume: volume * close,
      tradeCount: 100,
      takerBuyBase: volume / 2,
      takerBuyQuote: (volume / 2) * close,
    };
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/** Exchange-style provider with every capability mocked. */
export function createFakeProvider(catalog: string[] = []) {
  return {
    name: 'binance' as const,
    fetchCatalog: vi.fn(async (): Promise<string[]> => catalog),
    marketIdFor: vi.fn(
      (symbol: ResolvedSymbol, set: ReadonlySet<string>): string | null =>
        matchTradingPair(symbol.symbol, set),
    ),
    matchPair: vi.fn(
      (input: string, set: ReadonlySet<string>): string | null => matchTradingPair(input, set),
    ),
    fetchSeries: vi.fn(
      async (_marketId: string, _windowDays: number): Promise<OhlcvSample[]> => [],
    ),
    lookupCoin: vi.fn(async (_id: string): Promise<ResolvedSymbol | null> => null),
    searchCoins: vi.fn(async (_query: string): Promise<CoinSearchHit[]> => []),
  } satisfies MarketDataProvider;
}

export type FakeProvider = ReturnType<typeof createFakeProvider>;

/** Aggregator-style provider: coin ids as the catalog and no trading pairs. */
export function createFakeAggregatorProvider(ids: string[] = []) {
  return {
    name: 'coingecko' as const,
    fetchCatalog: vi.fn(async (): Promise<string[]> => ids),
    marketIdFor: vi.fn((symbol: ResolvedSymbol, set: ReadonlySet<string>): string | null =>
      set.size === 0 || set.has(symbol.id) ? symbol.id : null,
    ),
    fetchSeries: vi.fn(
      async (_marketId: string, _windowDays: number): Promise<OhlcvSample[]> => [],
    ),
    lookupCoin: vi.fn(async (_id: string): Promise<ResolvedSymbol | null> => null),
    searchCoins: vi.fn(async (_query: string): Promise<CoinSearchHit[]> => []),
  } satisfies MarketDataProvider;
}

export function createTestServices(
  provider: MarketDataProvider,
  log: FastifyBaseLogger = mockLogger(),
  opts: { deadlineMs?: number } = {},
): MarketServices {
  const catalog = new CatalogCache(() => provider.fetchCatalog(), log);
  const resolver = new SymbolResolver(provider, catalog, log);
  const series = new SeriesFetcher(provider, catalog, log);
  const analyzer = new MarketAnalyzer({
    resolver,
    series,
    log,
    windowDays: 30,
    ...(opts.deadlineMs ? { deadlineMs: opts.deadlineMs } : {}),
  });
  return {
    provider,
    catalog,
    resolver,
    series,
    analyzer,
    listings: {
      top: vi.fn(async () => []),
      search: vi.fn(async () => []),
    },
  };
}
