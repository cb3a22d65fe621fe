import type { FastifyReply, FastifyRequest } from 'fastify';

import { callerId } from '../lib/caller';

export default async function handler(request: FastifyRequest, reply: FastifyReply) {
  const { governor } = request.server.services;
  const info = await governor.info(callerId(request));

  return reply.send({
    current_requests: info.currentRequests,
    max_requests: info.maxRequests,
    remaining: info.remaining,
    window_minutes: info.windowMinutes,
    reset_at: new Date(info.resetAt).toISOString(),
    mode: governor.mode,
  });
}
