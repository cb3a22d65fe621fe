import type { FastifyRequest } from 'fastify';

const MAX_USER_ID_LENGTH = 128;

/**
 * Who the rate governor counts a request against: the `x-user-id` header when
 * present, else the client address.
 */
export function callerId(request: FastifyRequest): string {
  const header = request.headers['x-user-id'];
  const value = (Array.isArray(header) ? header[0] : header)?.trim();
  if (value) {
    return value.slice(0, MAX_USER_ID_LENGTH);
  }
  return `ip:${request.ip}`;
}
