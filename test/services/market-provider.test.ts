import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpClient } from '../../src/services/http-client.js';
import {
  createBinanceProvider,
  createCoingeckoProvider,
  getMarketProvider,
} from '../../src/services/market-provider.js';
import { jsonResponse, mockLogger } from '../helpers.js';

const BINANCE_URL = 'https://binance.test';
const COINGECKO_URL = 'https://coingecko.test/api/v3';

const KLINE_ROW = [
  1_700_000_000_000,
  '100.0',
  '110.0',
  '90.0',
  '105.5',
  '12.5',
  1_700_003_599_999,
  '1312.5',
  42,
  '6.0',
  '630.0',
  '0',
];

describe('market providers', () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

  function config() {
    return {
      http: new HttpClient(mockLogger(), { sleep: async () => {} }),
      binanceUrl: BINANCE_URL,
      coingeckoUrl: COINGECKO_URL,
    };
  }

  function requestedUrl(call = 0): string | undefined {
    return fetchMock.mock.calls[call]?.[0];
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('binance', () => {
    it('loads the pair catalog from exchange info', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ symbols: [{ symbol: 'BTCUSDT' }, { symbol: '' }, { symbol: 'ETHBTC' }] }),
      );

      const catalog = await createBinanceProvider(config()).fetchCatalog();

      expect(catalog).toEqual(['BTCUSDT', 'ETHBTC']);
      expect(requestedUrl()).toBe(`${BINANCE_URL}/api/v3/exchangeInfo`);
    });

    it('requests hourly klines for the whole window', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([KLINE_ROW, ['bad']]));

      const samples = await createBinanceProvider(config()).fetchSeries('BTCUSDT', 30);

      expect(requestedUrl()).toBe(
        `${BINANCE_URL}/api/v3/klines?symbol=BTCUSDT&interval=1h&limit=720`,
      );
      expect(samples).toEqual([
        {
          openTime: 1_700_000_000_000,
          open: 100,
          high: 110,
          low: 90,
          close: 105.5,
          volume: 12.5,
          closeTime: 1_700_003_599_999,
          quoteVolume: 1312.5,
          tradeCount: 42,
          takerBuyBase: 6,
          takerBuyQuote: 630,
        },
      ]);
    });

    it('caps the kline limit at the exchange maximum', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await createBinanceProvider(config()).fetchSeries('ETHUSDT', 60);

      expect(requestedUrl()).toBe(
        `${BINANCE_URL}/api/v3/klines?symbol=ETHUSDT&interval=1h&limit=1000`,
      );
    });

    it('maps a coin to its preferred trading pair', () => {
      const provider = createBinanceProvider(config());
      const btc = { id: 'bitcoin', symbol: 'BTC', name: 'Bitcoin' };

      expect(provider.marketIdFor(btc, new Set(['BTCUSDT']))).toBe('BTCUSDT');
      expect(provider.marketIdFor(btc, new Set())).toBeNull();
    });

    it('matches trading pairs from a base symbol', () => {
      const provider = createBinanceProvider(config());

      expect(provider.matchPair?.('eth', new Set(['ETHBTC', 'ETHUSDT']))).toBe('ETHUSDT');
      expect(provider.matchPair?.('eth', new Set(['BTCUSDT']))).toBeNull();
    });

    it('looks coins up on the aggregator', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'bitcoin', symbol: 'btc', name: 'Bitcoin' }));

      const coin = await createBinanceProvider(config()).lookupCoin('bitcoin');

      expect(coin).toEqual({ id: 'bitcoin', symbol: 'BTC', name: 'Bitcoin' });
      expect(requestedUrl()).toBe(
        `${COINGECKO_URL}/coins/bitcoin?localization=false&tickers=false&market_data=false&community_data=false&developer_data=false`,
      );
    });
  });

  describe('coingecko', () => {
    it('returns null for an unknown coin id', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"error":"coin not found"}', { status: 404 }));

      expect(await createCoingeckoProvider(config()).lookupCoin('nope')).toBeNull();
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('propagates other lookup failures', async () => {
      fetchMock.mockResolvedValueOnce(new Response('oops', { status: 500 }));

      await expect(createCoingeckoProvider(config()).lookupCoin('bitcoin')).rejects.toMatchObject({
        failure: { kind: 'http_status', status: 500 },
      });
    });

    it('searches coins in upstream order', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          coins: [
            { id: 'solana', symbol: 'sol', name: 'Solana', market_cap_rank: 5 },
            { id: 'broken', name: 'No Symbol' },
            { id: 'solana-wrapped', symbol: 'wsol', name: 'Wrapped SOL', market_cap_rank: null },
          ],
        }),
      );

      const hits = await createCoingeckoProvider(config()).searchCoins('sol');

      expect(requestedUrl()).toBe(`${COINGECKO_URL}/search?query=sol`);
      expect(hits).toEqual([
        { id: 'solana', symbol: 'SOL', name: 'Solana', marketCapRank: 5 },
        { id: 'solana-wrapped', symbol: 'WSOL', name: 'Wrapped SOL', marketCapRank: null },
      ]);
    });

    it('builds proxy samples from the market chart', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          prices: [
            [1_700_000_000_000, 35_000],
            [1_700_003_600_000, 35_100],
          ],
          total_volumes: [
            [1_700_000_000_000, 900],
            [1_700_003_600_000, 950],
          ],
        }),
      );

      const samples = await createCoingeckoProvider(config()).fetchSeries('bitcoin', 30);

      expect(requestedUrl()).toBe(`${COINGECKO_URL}/coins/bitcoin/market_chart?vs_currency=usd&days=30`);
      expect(samples).toHaveLength(2);
      expect(samples[1]).toEqual({
        openTime: 1_700_003_600_000,
        open: 35_100,
        high: 35_100,
        low: 35_100,
        close: 35_100,
        volume: 950,
        closeTime: 1_700_007_199_999,
        quoteVolume: 950,
        tradeCount: 0,
        takerBuyBase: 0,
        takerBuyQuote: 0,
      });
    });

    it('loads coin ids as the catalog', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([{ id: 'bitcoin', symbol: 'btc', name: 'Bitcoin' }, { symbol: 'x' }]),
      );

      expect(await createCoingeckoProvider(config()).fetchCatalog()).toEqual(['bitcoin']);
      expect(requestedUrl()).toBe(`${COINGECKO_URL}/coins/list`);
    });

    it('accepts any id while the catalog is unknown', () => {
      const provider = createCoingeckoProvider(config());
      const eth = { id: 'ethereum', symbol: 'ETH', name: 'Ethereum' };

      expect(provider.marketIdFor(eth, new Set())).toBe('ethereum');
      expect(provider.marketIdFor(eth, new Set(['ethereum']))).toBe('ethereum');
      expect(provider.marketIdFor(eth, new Set(['bitcoin']))).toBeNull();
    });

    it('has no trading pairs to match', () => {
      expect(createCoingeckoProvider(config()).matchPair).toBeUndefined();
    });
  });

  it('selects the provider by name', () => {
    expect(getMarketProvider('binance', config()).name).toBe('binance');
    expect(getMarketProvider('coingecko', config()).name).toBe('coingecko');
  });
});
