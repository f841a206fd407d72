import type { HttpClient } from './http-client.js';
import type { ExchangeInfo, Kline, KlineInterval } from './binance-client.types.js';
import { mapExchangeSymbols, mapKlines } from './market-provider.mappers.js';
import type { OhlcvSample } from './market-provider.types.js';

export const KLINE_LIMIT_MAX = 1000;

export async function fetchExchangeSymbols(
  http: HttpClient,
  baseUrl: string,
): Promise<string[]> {
  const info = await http.getJson<ExchangeInfo>(`${baseUrl}/api/v3/exchangeInfo`);
  return mapExchangeSymbols(info);
}

export async function fetchKlines(
  http: HttpClient,
  baseUrl: string,
  symbol: string,
  interval: KlineInterval,
  limit: number,
): Promise<OhlcvSample[]> {
  const rows = await http.getJson<Kline[]>(`${baseUrl}/api/v3/klines`, {
    symbol,
    interval,
    limit: Math.min(Math.max(1, limit), KLINE_LIMIT_MAX),
  });
  return mapKlines(rows);
}
