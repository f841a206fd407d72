import type { ErrorResponse } from './error-messages.types.js';

export const ERROR_MESSAGES = {
  notFound: 'not found',
  ambiguous: 'ambiguous symbol',
  insufficientData: 'insufficient data',
  upstreamUnavailable: 'market data unavailable, please try again later',
  computationFailed: 'failed to compute indicators',
  invalidQuery: 'invalid query',
  invalidSymbol: 'invalid path parameter',
  pairsUnsupported: 'pair lookup is not available for this market provider',
};

export function errorResponse(message: string): ErrorResponse {
  return { error: message };
}
