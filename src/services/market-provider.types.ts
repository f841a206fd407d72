export type SupportedMarketProvider = 'binance' | 'coingecko';

export interface ResolvedSymbol {
  /** provider-independent coin id or exchange pair */
  readonly id: string;
  /** short code, upper case */
  readonly symbol: string;
  readonly name: string;
}

export interface CandidateSuggestion {
  readonly id: string;
  readonly symbol: string;
  readonly name: string;
}

export interface CoinSearchHit extends CandidateSuggestion {
  readonly marketCapRank: number | null;
}

export interface OhlcvSample {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  closeTime: number;
  quoteVolume: number;
  tradeCount: number;
  takerBuyBase: number;
  takerBuyQuote: number;
}

export interface MarketDataProvider {
  readonly name: SupportedMarketProvider;
  /** identifiers the series endpoint accepts */
  fetchCatalog(): Promise<string[]>;
  /** market id for the series endpoint, or null when the catalog has none */
  marketIdFor(
    symbol: ResolvedSymbol,
    catalog: ReadonlySet<string>,
  ): string | null;
  /** exchange pair for a base symbol; absent on providers without trading pairs */
  matchPair?(input: string, catalog: ReadonlySet<string>): string | null;
  fetchSeries(marketId: string, windowDays: number): Promise<OhlcvSample[]>;
  /** exact coin lookup; null when the id is unknown */
  lookupCoin(id: string): Promise<ResolvedSymbol | null>;
  /** entries in the upstream relevance order */
  searchCoins(query: string): Promise<CoinSearchHit[]>;
}
