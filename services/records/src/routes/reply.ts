import type { FastifyReply } from 'fastify';
import type { z } from 'zod';
import type { RecordError } from '../contracts/outcome';
import { validationError } from '../validation/validate';

const STATUS_BY_CODE: Record<RecordError['code'], number> = {
  validation_failed: 400,
  duplicate_key: 400,
  not_found: 404,
};

export function sendError(reply: FastifyReply, error: RecordError, now: Date) {
  const body = {
    error: error.code,
    detail: error.message,
    timestamp: now.toISOString(),
    ...(error.code === 'validation_failed' ? { issues: error.issues } : {}),
  };
  return reply.code(STATUS_BY_CODE[error.code]).send(body);
}

export function badRequest(reply: FastifyReply, error: z.ZodError, now: Date) {
  return sendError(reply, validationError(error), now);
}
