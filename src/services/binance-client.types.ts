export interface ExchangeInfoSymbol {
  symbol: string;
  status?: string;
  baseAsset?: string;
  quoteAsset?: string;
}

export interface ExchangeInfo {
  symbols?: ExchangeInfoSymbol[];
}

/**
 * [openTime, open, high, low, close, volume, closeTime, quoteVolume,
 *  tradeCount, takerBuyBase, takerBuyQuote, ignore]
 */
export type Kline = [
  number,
  string,
  string,
  string,
  string,
  string,
  number,
  string,
  number,
  string,
  string,
  ...unknown[],
];

export type KlineInterval = '1h' | '4h' | '1d';
