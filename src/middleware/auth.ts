import type { FastifyReply, FastifyRequest } from 'fastify';
import { sendError } from '../errors.js';

export const API_KEY_HEADER = 'x-api-key';
export const USER_ID_HEADER = 'x-user-id';

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/** No-op unless an expected key is configured. */
export function requireApiKey(expectedKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!expectedKey) return;

    if (headerValue(request, API_KEY_HEADER) !== expectedKey) {
      return sendError(reply, 'INVALID_API_KEY');
    }
  };
}

/**
 * The caller id is set by the upstream gateway after it has authenticated
 * the user; this service trusts it as-is.
 */
export function callerId(request: FastifyRequest): string | undefined {
  return headerValue(request, USER_ID_HEADER);
}

export async function requireCaller(request: FastifyRequest, reply: FastifyReply) {
  if (!callerId(request)) {
    return sendError(reply, 'UNAUTHORIZED');
  }
}
