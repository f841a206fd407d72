export const RATE_LIMITS = {
  LAX: { max: 120, timeWindow: '1 minute' },
  RELAXED: { max: 60, timeWindow: '1 minute' },
  MODERATE: { max: 20, timeWindow: '1 minute' },
} as const;
