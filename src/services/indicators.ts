import type { FastifyBaseLogger } from 'fastify';
import type { OhlcvSample } from './market-provider.types.js';
import type {
  IndicatorName,
  IndicatorOutcome,
  IndicatorSnapshot,
} from './indicators.types.js';

export const MIN_SAMPLES = 50;
export const RSI_PERIOD = 14;
export const EMA_SHORT_PERIOD = 20;
export const EMA_LONG_PERIOD = 50;
export const MACD_FAST_PERIOD = 12;
export const MACD_SLOW_PERIOD = 26;
export const LONG_VOLUME_LOOKBACK = 24;

const NEUTRAL_RSI = 50;

type Series = (number | undefined)[];

const NUMERIC_FIELDS = [
  'openTime',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'closeTime',
  'quoteVolume',
  'tradeCount',
  'takerBuyBase',
  'takerBuyQuote',
] as const satisfies readonly (keyof OhlcvSample)[];

function isValidSample(sample: OhlcvSample): boolean {
  return NUMERIC_FIELDS.every((field) => {
    const value = sample[field];
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
  });
}

/** Valid samples in chronological order; later rows repeating a timestamp are dropped. */
export function buildSeries(samples: readonly OhlcvSample[]): OhlcvSample[] {
  const seen = new Set<number>();
  const valid: OhlcvSample[] = [];
  for (const sample of samples) {
    if (!isValidSample(sample) || seen.has(sample.openTime)) continue;
    seen.add(sample.openTime);
    valid.push(sample);
  }
  return valid.sort((a, b) => a.openTime - b.openTime);
}

export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/**
 * Recursive exponential mean `y = (1 - alpha) * y_prev + alpha * x`, seeded
 * on the first defined input. Values before `minPeriods` inputs are undefined.
 */
export function ewm(
  values: readonly (number | undefined)[],
  alpha: number,
  minPeriods: number,
): Series {
  const out: Series = [];
  let prev: number | undefined;
  let seen = 0;
  for (const value of values) {
    if (value !== undefined) {
      prev = prev === undefined ? value : (1 - alpha) * prev + alpha * value;
      seen++;
    }
    out.push(seen >= minPeriods ? prev : undefined);
  }
  return out;
}

export function calcEma(closes: readonly number[], period: number): Series {
  return ewm(closes, 2 / (period + 1), period);
}

/** Wilder RSI; the first bar counts as a zero change, so values start at index `period - 1`. */
export function calcRsi(closes: readonly number[], period = RSI_PERIOD): Series {
  if (!closes.length) return [];
  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let i = 1; i < closes.length; i++) {
    const diff = closes[i] - closes[i - 1];
    gains.push(diff > 0 ? diff : 0);
    losses.push(diff < 0 ? -diff : 0);
  }
  const avgGain = ewm(gains, 1 / period, period);
  const avgLoss = ewm(losses, 1 / period, period);
  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === undefined || loss === undefined) return undefined;
    if (loss === 0) return 100;
    return 100 - 100 / (1 + gain / loss);
  });
}

export function calcMacd(
  closes: readonly number[],
  fast = MACD_FAST_PERIOD,
  slow = MACD_SLOW_PERIOD,
): Series {
  const emaFast = calcEma(closes, fast);
  const emaSlow = calcEma(closes, slow);
  return emaFast.map((value, i) => {
    const slowValue = emaSlow[i];
    return value === undefined || slowValue === undefined
      ? undefined
      : value - slowValue;
  });
}

export function percentChange(current: number, previous: number): number {
  if (previous <= 0) return 0;
  return ((current - previous) / previous) * 100;
}

function last(series: Series): number | undefined {
  return series[series.length - 1];
}

function buildSnapshot(series: OhlcvSample[]): IndicatorSnapshot {
  const closes = series.map((s) => s.close);
  const volumes = series.map((s) => s.volume);
  const price = closes[closes.length - 1];
  const defaulted: IndicatorName[] = [];

  const pick = (name: IndicatorName, value: number | undefined, fallback: number) => {
    if (value === undefined || Number.isNaN(value)) {
      defaulted.push(name);
      return fallback;
    }
    return value;
  };

  const rsi = pick('rsi', last(calcRsi(closes)), NEUTRAL_RSI);
  const emaShort = pick('emaShort', last(calcEma(closes, EMA_SHORT_PERIOD)), price);
  const emaLong = pick('emaLong', last(calcEma(closes, EMA_LONG_PERIOD)), price);
  const macd = pick('macd', last(calcMacd(closes)), 0);

  const currentVolume = volumes[volumes.length - 1];
  const volumeChangeShort = percentChange(currentVolume, volumes[volumes.length - 2]);
  const volumeChangeLong =
    volumes.length > LONG_VOLUME_LOOKBACK
      ? percentChange(currentVolume, volumes[volumes.length - 1 - LONG_VOLUME_LOOKBACK])
      : 0;

  const snapshot: IndicatorSnapshot = {
    price: roundTo(price, 2),
    rsi: roundTo(rsi, 2),
    emaShort: roundTo(emaShort, 2),
    emaLong: roundTo(emaLong, 2),
    macd: roundTo(macd, 4),
    volumeChangeShort: roundTo(volumeChangeShort, 2),
    volumeChangeLong: roundTo(volumeChangeLong, 2),
    sampleCount: series.length,
    defaulted,
  };

  const numeric = [
    snapshot.price,
    snapshot.rsi,
    snapshot.emaShort,
    snapshot.emaLong,
    snapshot.macd,
    snapshot.volumeChangeShort,
    snapshot.volumeChangeLong,
  ];
  if (!numeric.every(Number.isFinite)) {
    throw new Error('indicator produced a non-finite value');
  }
  return Object.freeze(snapshot);
}

export function computeIndicators(
  samples: readonly OhlcvSample[],
  log?: FastifyBaseLogger,
): IndicatorOutcome {
  const series = buildSeries(samples);
  if (series.length < MIN_SAMPLES) {
    log?.warn(
      { count: series.length, required: MIN_SAMPLES },
      'insufficient data for indicators',
    );
    return { kind: 'insufficient_data', count: series.length };
  }

  try {
    return { kind: 'snapshot', snapshot: buildSnapshot(series) };
  } catch (err) {
    log?.error({ err, count: series.length }, 'failed to compute indicators');
    return {
      kind: 'computation_error',
      message: err instanceof Error ? err.message : String(err),
    };
  }
}
