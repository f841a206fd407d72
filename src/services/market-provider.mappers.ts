import type { ExchangeInfo } from './binance-client.types.js';
import type {
  CoinDetailsResponse,
  CoinListEntry,
  CoinMarketEntry,
  MarketChartResponse,
  SearchCoinEntry,
  TopCoin,
} from './coingecko-client.types.js';
import type {
  CoinSearchHit,
  OhlcvSample,
  ResolvedSymbol,
} from './market-provider.types.js';

const HOUR_MS = 60 * 60 * 1000;

export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toNonNegative(value: unknown): number | undefined {
  const parsed = toFiniteNumber(value);
  return parsed !== undefined && parsed >= 0 ? parsed : undefined;
}

function toNullableNumber(value: unknown): number | null {
  return toFiniteNumber(value) ?? null;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

export function mapExchangeSymbols(info: ExchangeInfo): string[] {
  const entries = Array.isArray(info?.symbols) ? info.symbols : [];
  return entries
    .map((entry) => nonEmptyString(entry?.symbol))
    .filter((symbol): symbol is string => symbol !== undefined);
}

export function mapKline(row: unknown): OhlcvSample | null {
  if (!Array.isArray(row) || row.length < 11) return null;
  const openTime = toNonNegative(row[0]);
  const open = toNonNegative(row[1]);
  const high = toNonNegative(row[2]);
  const low = toNonNegative(row[3]);
  const close = toNonNegative(row[4]);
  const volume = toNonNegative(row[5]);
  const closeTime = toNonNegative(row[6]);
  const quoteVolume = toNonNegative(row[7]);
  const tradeCount = toNonNegative(row[8]);
  const takerBuyBase = toNonNegative(row[9]);
  const takerBuyQuote = toNonNegative(row[10]);
  if (
    openTime === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined ||
    volume === undefined ||
    closeTime === undefined ||
    quoteVolume === undefined ||
    tradeCount === undefined ||
    takerBuyBase === undefined ||
    takerBuyQuote === undefined
  ) {
    return null;
  }
  return {
    openTime,
    open,
    high,
    low,
    close,
    volume,
    closeTime,
    quoteVolume,
    tradeCount,
    takerBuyBase,
    takerBuyQuote,
  };
}

export function mapKlines(rows: unknown): OhlcvSample[] {
  if (!Array.isArray(rows)) return [];
  return rows
    .map((row) => mapKline(row))
    .filter((sample): sample is OhlcvSample => sample !== null);
}

/**
 * Point-price history has no candle bodies, so every field of the proxy
 * sample is derived from the price at the bucket start.
 */
export function mapMarketChart(chart: MarketChartResponse): OhlcvSample[] {
  const prices = Array.isArray(chart?.prices) ? chart.prices : [];
  const volumes = new Map<number, number>();
  for (const point of Array.isArray(chart?.total_volumes) ? chart.total_volumes : []) {
    const ts = toNonNegative(point?.[0]);
    const volume = toNonNegative(point?.[1]);
    if (ts !== undefined && volume !== undefined) volumes.set(ts, volume);
  }

  const samples: OhlcvSample[] = [];
  for (const point of prices) {
    const openTime = toNonNegative(point?.[0]);
    const price = toNonNegative(point?.[1]);
    if (openTime === undefined || price === undefined) continue;
    const volume = volumes.get(openTime);
    if (volume === undefined) continue;
    samples.push({
      openTime,
      open: price,
      high: price,
      low: price,
      close: price,
      volume,
      closeTime: openTime + HOUR_MS - 1,
      quoteVolume: volume,
      tradeCount: 0,
      takerBuyBase: 0,
      takerBuyQuote: 0,
    });
  }
  return samples;
}

export function mapCoinDetails(details: CoinDetailsResponse): ResolvedSymbol | null {
  const id = nonEmptyString(details?.id);
  const symbol = nonEmptyString(details?.symbol);
  const name = nonEmptyString(details?.name);
  if (!id || !symbol || !name) return null;
  return { id, symbol: symbol.toUpperCase(), name };
}

export function mapCoinList(entries: unknown): string[] {
  if (!Array.isArray(entries)) return [];
  return entries
    .map((entry: CoinListEntry) => nonEmptyString(entry?.id))
    .filter((id): id is string => id !== undefined);
}

export function mapSearchCoin(entry: SearchCoinEntry): CoinSearchHit | null {
  const id = nonEmptyString(entry?.id);
  const symbol = nonEmptyString(entry?.symbol);
  const name = nonEmptyString(entry?.name);
  if (!id || !symbol || !name) return null;
  return {
    id,
    symbol: symbol.toUpperCase(),
    name,
    marketCapRank: toNullableNumber(entry.market_cap_rank),
  };
}

export function mapCoinMarket(entry: CoinMarketEntry): TopCoin | null {
  const id = nonEmptyString(entry?.id);
  const symbol = nonEmptyString(entry?.symbol);
  const name = nonEmptyString(entry?.name);
  if (!id || !symbol || !name) return null;
  return {
    id,
    symbol: symbol.toUpperCase(),
    name,
    currentPrice: toNullableNumber(entry.current_price),
    priceChangePercentage24h: toNullableNumber(entry.price_change_percentage_24h),
    marketCapRank: toNullableNumber(entry.market_cap_rank),
  };
}
