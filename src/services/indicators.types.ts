export type IndicatorName = 'rsi' | 'emaShort' | 'emaLong' | 'macd';

export interface IndicatorSnapshot {
  readonly price: number;
  readonly rsi: number;
  readonly emaShort: number;
  readonly emaLong: number;
  readonly macd: number;
  /** percent change of the last volume against the previous sample */
  readonly volumeChangeShort: number;
  /** percent change of the last volume against 24 samples earlier */
  readonly volumeChangeLong: number;
  readonly sampleCount: number;
  /** indicators that were not warmed up and carry their fallback value */
  readonly defaulted: readonly IndicatorName[];
}

export type IndicatorOutcome =
  | { kind: 'snapshot'; snapshot: IndicatorSnapshot }
  | { kind: 'insufficient_data'; count: number }
  | { kind: 'computation_error'; message: string };
