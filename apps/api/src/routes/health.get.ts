import type { FastifyReply, FastifyRequest } from 'fastify';

export default async function handler(request: FastifyRequest, reply: FastifyReply) {
  const report = await request.server.services.health.run();
  return reply.status(report.status === 'unhealthy' ? 503 : 200).send(report);
}
