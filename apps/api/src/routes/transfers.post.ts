import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { PLATFORM_NAMES, RateLimitedError } from '@tracklift/contracts';

import { callerId } from '../lib/caller';
import { detectPlatform } from '../lib/transfer/platform';

const TransferBody = z.object({
  url: z.string().trim().min(1, 'url is required'),
  target: z.enum(PLATFORM_NAMES),
  playlist_name: z.string().trim().min(1).max(100).optional(),
});

export default async function handler(request: FastifyRequest, reply: FastifyReply) {
  const body = TransferBody.parse(request.body);
  const { governor, transfers } = request.server.services;

  request.requirePlatform(body.target);
  request.requirePlatform(detectPlatform(body.url));

  const admission = await governor.admit(callerId(request));
  if (!admission.allowed) {
    throw new RateLimitedError(admission.reason, admission.retryAfterMs);
  }

  const result = await transfers.transfer({
    sourceUrl: body.url,
    targetPlatform: body.target,
    playlistName: body.playlist_name,
  });

  reply.header('x-ratelimit-mode', admission.mode);
  reply.header('x-ratelimit-remaining', String(admission.remaining));
  return reply.status(201).send({
    playlist_url: result.destinationPlaylistUrl,
    playlist_id: result.destinationPlaylistId,
    playlist_name: result.playlistName,
    source: result.sourcePlatform,
    target: result.targetPlatform,
    missing: result.missing,
    report: {
      total: result.report.total,
      resolved: result.report.resolved,
      unresolved: result.report.unresolved,
      by_tier: result.report.byTier,
    },
  });
}
