import type {
  CandidateSuggestion,
  ResolvedSymbol,
  SupportedMarketProvider,
} from './market-provider.types.js';

export type ResolutionOutcome =
  | { kind: 'resolved'; symbol: ResolvedSymbol }
  | { kind: 'ambiguous'; suggestions: CandidateSuggestion[] }
  | { kind: 'not_found'; suggestions: [] }
  | { kind: 'unavailable'; message: string };

export type PairResolution =
  | { kind: 'resolved'; symbol: ResolvedSymbol }
  | { kind: 'not_found'; suggestions: [] }
  | { kind: 'unavailable'; message: string }
  /** the configured provider has no trading pairs */
  | { kind: 'unsupported'; provider: SupportedMarketProvider };

export type ResolutionStrategy = 'coin' | 'pair';
