import type { FastifyInstance } from 'fastify';
import { RATE_LIMITS } from '../rate-limit.js';
import { ERROR_MESSAGES, errorResponse } from '../util/error-messages.js';
import { parseRequestParams, symbolParamsSchema } from './_shared/validation.js';

export default async function pairRoutes(app: FastifyInstance) {
  app.get(
    '/pairs/:symbol',
    {
      config: { rateLimit: RATE_LIMITS.RELAXED },
    },
    async (req, reply) => {
      const params = parseRequestParams(symbolParamsSchema, req, reply);
      if (!params) return;
      const resolution = await app.market.resolver.resolvePair(params.symbol);
      if (resolution.kind === 'unsupported') {
        return reply.code(400).send(errorResponse(ERROR_MESSAGES.pairsUnsupported));
      }
      if (resolution.kind === 'unavailable') {
        return reply.code(502).send(errorResponse(ERROR_MESSAGES.upstreamUnavailable));
      }
      if (resolution.kind === 'not_found') {
        return reply.code(404).send(errorResponse(ERROR_MESSAGES.notFound));
      }
      return resolution.symbol;
    },
  );
}
