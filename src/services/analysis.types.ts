import type { IndicatorSnapshot } from './indicators.types.js';
import type {
  CandidateSuggestion,
  ResolvedSymbol,
  SupportedMarketProvider,
} from './market-provider.types.js';
import type { NewsItem } from './news.types.js';
import type { ResolutionStrategy } from './symbol-resolver.types.js';

export interface ReferenceSnapshot {
  symbol: string;
  price: number;
  rsi: number;
}

export interface AnalysisReport {
  symbol: ResolvedSymbol;
  marketId: string;
  snapshot: IndicatorSnapshot;
  reference: ReferenceSnapshot;
  news: NewsItem[];
  generatedAt: string;
}

export type NetworkFailureReason = 'upstream' | 'deadline';

export type AnalysisOutcome =
  | { kind: 'ok'; report: AnalysisReport }
  | { kind: 'not_found'; input: string; suggestions: [] }
  | { kind: 'ambiguous'; input: string; suggestions: CandidateSuggestion[] }
  | { kind: 'insufficient_data'; symbol: ResolvedSymbol; count: number }
  | { kind: 'network_failure'; reason: NetworkFailureReason; message: string }
  | { kind: 'computation_error'; symbol: ResolvedSymbol; message: string }
  | {
      kind: 'unsupported_strategy';
      strategy: ResolutionStrategy;
      provider: SupportedMarketProvider;
    };

export interface AnalyzeOptions {
  strategy?: ResolutionStrategy;
  windowDays?: number;
}
