import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ERROR_MESSAGES, errorResponse } from '../../util/error-messages.js';

export const symbolParamsSchema = z
  .object({
    symbol: z.string().trim().min(1).max(64).regex(/^[A-Za-z0-9._-]+$/),
  })
  .strict();

export const limitSchema = (max: number, fallback: number) =>
  z.coerce.number().int().min(1).max(max).default(fallback);

export function parseRequestParams<S extends z.ZodTypeAny>(
  schema: S,
  req: FastifyRequest,
  reply: FastifyReply,
): z.infer<S> | undefined {
  const result = schema.safeParse(req.params);
  if (!result.success) {
    reply.code(400).send(errorResponse(ERROR_MESSAGES.invalidSymbol));
    return undefined;
  }
  return result.data;
}

export function parseQuery<S extends z.ZodTypeAny>(
  schema: S,
  req: FastifyRequest,
  reply: FastifyReply,
): z.infer<S> | undefined {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    req.log.warn({ issues: result.error.issues }, 'invalid query');
    reply.code(400).send(errorResponse(ERROR_MESSAGES.invalidQuery));
    return undefined;
  }
  return result.data;
}
