import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import { isExpiryError, type ExpiryErrorCode } from '../errors';

const STATUS_BY_CODE: Record<ExpiryErrorCode, number> = {
  validation_failed: 400,
  not_found: 404,
  conflict: 409,
  transport_failed: 503,
};

export function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ status: 'FAILED', error: 'validation_failed', detail: error.flatten() });
}

/** Maps engine errors to a FAILED reply; anything else goes to Fastify's error handler. */
export function sendFailure(req: FastifyRequest, reply: FastifyReply, err: unknown) {
  if (!isExpiryError(err)) throw err;
  const status = STATUS_BY_CODE[err.code];
  if (status >= 500) {
    req.log.error({ err }, 'Record store operation failed');
  }
  return reply.code(status).send({ status: 'FAILED', error: err.code, detail: err.message });
}
