import type { FastifyBaseLogger } from 'fastify';
import { computeIndicators } from './indicators.js';
import type { NewsClient } from './news.js';
import type { NewsItem } from './news.types.js';
import type { ResolvedSymbol } from './market-provider.types.js';
import { DEFAULT_WINDOW_DAYS, type SeriesFetcher } from './series-fetcher.js';
import type { SymbolResolver } from './symbol-resolver.js';
import type { PairResolution, ResolutionOutcome } from './symbol-resolver.types.js';
import type {
  AnalysisOutcome,
  AnalyzeOptions,
  ReferenceSnapshot,
} from './analysis.types.js';

const REFERENCE_SYMBOL: ResolvedSymbol = {
  id: 'bitcoin',
  symbol: 'BTC',
  name: 'Bitcoin',
};

const REFERENCE_FALLBACK: ReferenceSnapshot = { symbol: 'BTC', price: 0, rsi: 50 };

export interface MarketAnalyzerDeps {
  resolver: SymbolResolver;
  series: SeriesFetcher;
  news?: NewsClient;
  log: FastifyBaseLogger;
  windowDays?: number;
  /** stop waiting for the pipeline after this long; in-flight calls are not aborted */
  deadlineMs?: number;
}

class DeadlineExceeded extends Error {
  constructor(ms: number) {
    super(`analysis did not finish within ${ms}ms`);
    this.name = 'DeadlineExceeded';
  }
}

async function withDeadline<T>(work: Promise<T>, ms: number | undefined): Promise<T> {
  if (!ms) return work;
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceeded(ms)), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class MarketAnalyzer {
  constructor(private readonly deps: MarketAnalyzerDeps) {}

  async analyze(input: string, opts: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    try {
      return await withDeadline(this.run(input, opts), this.deps.deadlineMs);
    } catch (err) {
      if (err instanceof DeadlineExceeded) {
        this.deps.log.error({ input, deadlineMs: this.deps.deadlineMs }, 'analysis deadline exceeded');
        return { kind: 'network_failure', reason: 'deadline', message: err.message };
      }
      throw err;
    }
  }

  private async resolve(
    input: string,
    opts: AnalyzeOptions,
  ): Promise<ResolutionOutcome | PairResolution> {
    if (opts.strategy === 'pair') return this.deps.resolver.resolvePair(input);
    return this.deps.resolver.resolveCoin(input);
  }

  private async run(input: string, opts: AnalyzeOptions): Promise<AnalysisOutcome> {
    const { log } = this.deps;
    const windowDays = opts.windowDays ?? this.deps.windowDays ?? DEFAULT_WINDOW_DAYS;

    const resolution = await this.resolve(input, opts);
    if (resolution.kind === 'not_found') {
      return { kind: 'not_found', input, suggestions: [] };
    }
    if (resolution.kind === 'ambiguous') {
      return { kind: 'ambiguous', input, suggestions: resolution.suggestions };
    }
    if (resolution.kind === 'unavailable') {
      return {
        kind: 'network_failure',
        reason: 'upstream',
        message: resolution.message,
      };
    }
    if (resolution.kind === 'unsupported') {
      return {
        kind: 'unsupported_strategy',
        strategy: 'pair',
        provider: resolution.provider,
      };
    }

    const { symbol } = resolution;
    log.info({ input, id: symbol.id, symbol: symbol.symbol }, 'analyzing symbol');

    const series = await this.deps.series.fetchSeries(symbol, windowDays);
    if (series.failure) {
      return {
        kind: 'network_failure',
        reason: 'upstream',
        message: series.failure.message,
      };
    }
    if (!series.marketId) {
      return { kind: 'not_found', input, suggestions: [] };
    }

    const outcome = computeIndicators(series.samples, log);
    if (outcome.kind === 'insufficient_data') {
      return { kind: 'insufficient_data', symbol, count: outcome.count };
    }
    if (outcome.kind === 'computation_error') {
      return { kind: 'computation_error', symbol, message: outcome.message };
    }

    const [reference, news] = await Promise.all([
      this.reference(symbol, outcome.snapshot, windowDays),
      this.loadNews(symbol),
    ]);

    return {
      kind: 'ok',
      report: {
        symbol,
        marketId: series.marketId,
        snapshot: outcome.snapshot,
        reference,
        news,
        generatedAt: new Date().toISOString(),
      },
    };
  }

  private async reference(
    symbol: ResolvedSymbol,
    snapshot: { price: number; rsi: number },
    windowDays: number,
  ): Promise<ReferenceSnapshot> {
    if (symbol.symbol === REFERENCE_SYMBOL.symbol) {
      return { symbol: REFERENCE_SYMBOL.symbol, price: snapshot.price, rsi: snapshot.rsi };
    }
    const series = await this.deps.series.fetchSeries(REFERENCE_SYMBOL, windowDays);
    const outcome = computeIndicators(series.samples, this.deps.log);
    if (outcome.kind !== 'snapshot') {
      this.deps.log.warn({ outcome: outcome.kind }, 'reference snapshot unavailable');
      return REFERENCE_FALLBACK;
    }
    return {
      symbol: REFERENCE_SYMBOL.symbol,
      price: outcome.snapshot.price,
      rsi: outcome.snapshot.rsi,
    };
  }

  private async loadNews(symbol: ResolvedSymbol): Promise<NewsItem[]> {
    if (!this.deps.news) return [];
    return this.deps.news.fetchCoinNews(symbol.name, symbol.symbol);
  }
}
