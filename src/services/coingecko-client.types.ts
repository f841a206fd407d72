export interface CoinDetailsResponse {
  id?: string;
  symbol?: string;
  name?: string;
}

export interface CoinListEntry {
  id?: string;
  symbol?: string;
  name?: string;
}

export interface SearchCoinEntry {
  id?: string;
  symbol?: string;
  name?: string;
  market_cap_rank?: number | null;
}

export interface SearchResponse {
  coins?: SearchCoinEntry[];
}

export interface MarketChartResponse {
  prices?: [number, number][];
  total_volumes?: [number, number][];
}

export interface CoinMarketEntry {
  id?: string;
  symbol?: string;
  name?: string;
  current_price?: number | null;
  price_change_percentage_24h?: number | null;
  market_cap_rank?: number | null;
}

export interface TopCoin {
  id: string;
  symbol: string;
  name: string;
  currentPrice: number | null;
  priceChangePercentage24h: number | null;
  marketCapRank: number | null;
}
