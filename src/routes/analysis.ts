import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import type { AnalysisOutcome } from '../services/analysis.types.js';
import { ERROR_MESSAGES, errorResponse } from '../util/error-messages.js';
import {
  parseQuery,
  parseRequestParams,
  symbolParamsSchema,
} from './_shared/validation.js';

const analysisQuerySchema = z
  .object({
    strategy: z.enum(['coin', 'pair']).default('coin'),
    days: z.coerce.number().int().min(3).max(90).optional(),
  })
  .strict();

const STATUS_BY_KIND: Record<AnalysisOutcome['kind'], number> = {
  ok: 200,
  not_found: 404,
  ambiguous: 409,
  insufficient_data: 422,
  network_failure: 502,
  computation_error: 500,
  unsupported_strategy: 400,
};

function toBody(outcome: AnalysisOutcome) {
  switch (outcome.kind) {
    case 'ok':
      return outcome.report;
    case 'not_found':
      return { ...errorResponse(ERROR_MESSAGES.notFound), suggestions: [] };
    case 'ambiguous':
      return {
        ...errorResponse(ERROR_MESSAGES.ambiguous),
        suggestions: outcome.suggestions,
      };
    case 'insufficient_data':
      return {
        ...errorResponse(ERROR_MESSAGES.insufficientData),
        symbol: outcome.symbol.symbol,
        count: outcome.count,
      };
    case 'network_failure':
      return { ...errorResponse(ERROR_MESSAGES.upstreamUnavailable), reason: outcome.reason };
    case 'computation_error':
      return errorResponse(ERROR_MESSAGES.computationFailed);
    case 'unsupported_strategy':
      return {
        ...errorResponse(ERROR_MESSAGES.pairsUnsupported),
        provider: outcome.provider,
      };
  }
}

export default async function analysisRoutes(app: FastifyInstance) {
  app.get(
    '/analysis/:symbol',
    {
      config: { rateLimit: RATE_LIMITS.MODERATE },
    },
    async (req, reply) => {
      const params = parseRequestParams(symbolParamsSchema, req, reply);
      if (!params) return;
      const query = parseQuery(analysisQuerySchema, req, reply);
      if (!query) return;

      const outcome = await app.market.analyzer.analyze(params.symbol, {
        strategy: query.strategy,
        ...(query.days ? { windowDays: query.days } : {}),
      });
      if (outcome.kind !== 'ok') {
        req.log.info({ symbol: params.symbol, outcome: outcome.kind }, 'analysis not available');
      }
      return reply.code(STATUS_BY_KIND[outcome.kind]).send(toBody(outcome));
    },
  );
}
