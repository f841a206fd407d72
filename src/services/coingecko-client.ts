import type { HttpClient } from './http-client.js';
import { isFetchError } from './http-client.js';
import type {
  CoinDetailsResponse,
  CoinMarketEntry,
  MarketChartResponse,
  SearchResponse,
  TopCoin,
} from './coingecko-client.types.js';
import {
  mapCoinDetails,
  mapCoinList,
  mapCoinMarket,
  mapMarketChart,
  mapSearchCoin,
} from './market-provider.mappers.js';
import type {
  CoinSearchHit,
  OhlcvSample,
  ResolvedSymbol,
} from './market-provider.types.js';

export async function fetchCoin(
  http: HttpClient,
  baseUrl: string,
  id: string,
): Promise<ResolvedSymbol | null> {
  try {
    const details = await http.getJson<CoinDetailsResponse>(
      `${baseUrl}/coins/${encodeURIComponent(id)}`,
      {
        localization: false,
        tickers: false,
        market_data: false,
        community_data: false,
        developer_data: false,
      },
    );
    return mapCoinDetails(details);
  } catch (err) {
    if (isFetchError(err) && err.status === 404) return null;
    throw err;
  }
}

export async function fetchCoinIds(
  http: HttpClient,
  baseUrl: string,
): Promise<string[]> {
  const entries = await http.getJson<unknown>(`${baseUrl}/coins/list`);
  return mapCoinList(entries);
}

export async function searchCoins(
  http: HttpClient,
  baseUrl: string,
  query: string,
): Promise<CoinSearchHit[]> {
  const res = await http.getJson<SearchResponse>(`${baseUrl}/search`, { query });
  const coins = Array.isArray(res?.coins) ? res.coins : [];
  return coins
    .map((coin) => mapSearchCoin(coin))
    .filter((coin): coin is CoinSearchHit => coin !== null);
}

export async function fetchMarketChart(
  http: HttpClient,
  baseUrl: string,
  id: string,
  days: number,
): Promise<OhlcvSample[]> {
  const chart = await http.getJson<MarketChartResponse>(
    `${baseUrl}/coins/${encodeURIComponent(id)}/market_chart`,
    { vs_currency: 'usd', days },
  );
  return mapMarketChart(chart);
}

export async function fetchTopCoins(
  http: HttpClient,
  baseUrl: string,
  limit = 20,
): Promise<TopCoin[]> {
  const entries = await http.getJson<CoinMarketEntry[]>(`${baseUrl}/coins/markets`, {
    vs_currency: 'usd',
    order: 'market_cap_desc',
    per_page: limit,
    page: 1,
    sparkline: false,
  });
  return (Array.isArray(entries) ? entries : [])
    .map((entry) => mapCoinMarket(entry))
    .filter((coin): coin is TopCoin => coin !== null);
}

/** Search entries whose symbol or name contains the query. */
export async function searchListings(
  http: HttpClient,
  baseUrl: string,
  query: string,
  limit = 10,
): Promise<CoinSearchHit[]> {
  const needle = query.toLowerCase();
  const hits = await searchCoins(http, baseUrl, query);
  return hits
    .filter(
      (hit) =>
        hit.symbol.toLowerCase().includes(needle) ||
        hit.name.toLowerCase().includes(needle),
    )
    .slice(0, limit);
}
