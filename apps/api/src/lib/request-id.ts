import type { FastifyRequest } from 'fastify';
import { nanoid } from 'nanoid';

declare module 'fastify' {
  interface FastifyRequest {
    requestId?: string;
    startedAt?: number;
  }
}

/**
 * The request's correlation id: `x-request-id` (or `x-correlation-id`) when the
 * caller sent one, else a fresh `req_` id. Stable for the life of the request.
 */
export function resolveRequestId(req: FastifyRequest): string {
  if (req.requestId) {
    return req.requestId;
  }

  const header = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  const headerValue = Array.isArray(header) ? header[0] : header;
  const requestId = typeof headerValue === 'string' && headerValue.length > 0 ? headerValue : `req_${nanoid(12)}`;
  req.requestId = requestId;
  return requestId;
}
