import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import { isFetchError } from '../services/http-client.js';
import { ERROR_MESSAGES, errorResponse } from '../util/error-messages.js';
import { limitSchema, parseQuery } from './_shared/validation.js';

const searchQuerySchema = z
  .object({
    q: z.string().trim().min(1).max(64),
    limit: limitSchema(25, 10),
  })
  .strict();

const topQuerySchema = z.object({ limit: limitSchema(100, 20) }).strict();

export default async function coinRoutes(app: FastifyInstance) {
  app.get(
    '/coins/search',
    {
      config: { rateLimit: RATE_LIMITS.RELAXED },
    },
    async (req, reply) => {
      const query = parseQuery(searchQuerySchema, req, reply);
      if (!query) return;
      try {
        const coins = await app.market.listings.search(query.q, query.limit);
        return { query: query.q, coins };
      } catch (err) {
        if (!isFetchError(err)) throw err;
        req.log.error({ err, query: query.q }, 'failed to search coins');
        return reply.code(502).send(errorResponse(ERROR_MESSAGES.upstreamUnavailable));
      }
    },
  );

  app.get(
    '/coins/top',
    {
      config: { rateLimit: RATE_LIMITS.RELAXED },
    },
    async (req, reply) => {
      const query = parseQuery(topQuerySchema, req, reply);
      if (!query) return;
      try {
        const coins = await app.market.listings.top(query.limit);
        return { coins };
      } catch (err) {
        if (!isFetchError(err)) throw err;
        req.log.error({ err }, 'failed to fetch top coins');
        return reply.code(502).send(errorResponse(ERROR_MESSAGES.upstreamUnavailable));
      }
    },
  );
}
