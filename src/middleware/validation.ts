import type { FastifyReply } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { sendError } from '../errors.js';

type Source = 'body' | 'query' | 'params';

const MESSAGES: Record<Source, string> = {
  body: 'Invalid request body',
  query: 'Invalid query parameters',
  params: 'Invalid path parameters',
};

/**
 * Parse a request part with zod. On failure a 400 is sent and undefined
 * returned, so handlers can `if (!parsed) return reply;`.
 */
export function parseRequest<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  source: Source,
  value: unknown,
  reply: FastifyReply
): T | undefined {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  sendError(reply, 'VALIDATION_ERROR', {
    source,
    message: MESSAGES[source],
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
  return undefined;
}
