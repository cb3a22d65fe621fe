import type { FastifyReply, FastifyRequest } from 'fastify';

import { PLATFORM_NAMES } from '@tracklift/contracts';

import { PLATFORM_LABELS } from '../lib/transfer/platform';

export default async function handler(request: FastifyRequest, reply: FastifyReply) {
  const { platforms } = request.server.services;

  return reply.send({
    data: PLATFORM_NAMES.map((name) => ({
      name,
      label: PLATFORM_LABELS[name],
      enabled: platforms.flags[name],
      configured: platforms.available.includes(name),
    })),
    oracle_enabled: platforms.oracleEnabled,
  });
}
