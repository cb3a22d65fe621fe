import fp from 'fastify-plugin';

import { resolveRequestId } from '../lib/request-id';

/**
 * Request correlation and access logging on Fastify's pino logger.
 */
export default fp(async (app) => {
  app.addHook('onRequest', (req, reply, done) => {
    const requestId = resolveRequestId(req);
    req.startedAt = Date.now();

    // Add to response headers for client correlation
    reply.header('x-request-id', requestId);

    req.log.info(
      {
        requestId,
        method: req.method,
        path: req.url,
        remoteAddress: req.ip,
      },
      'incoming request',
    );

    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    const ms = Date.now() - (req.startedAt ?? Date.now());

    req.log.info(
      {
        requestId: req.requestId,
        path: req.url,
        status: reply.statusCode,
        responseTime: ms,
      },
      'request completed',
    );

    done();
  });
});
