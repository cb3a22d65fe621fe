import fp from 'fastify-plugin';

import type { AppMetrics } from '../lib/metrics';

export type MetricsPluginOptions = {
  metrics: AppMetrics;
};

/**
 * Counts HTTP requests by route and status and exposes the registry at
 * /metrics for Prometheus scraping.
 */
export default fp<MetricsPluginOptions>(async (app, opts) => {
  const { metrics } = opts;

  app.addHook('onResponse', (req, reply, done) => {
    metrics.httpRequest(req.routeOptions.url ?? 'unmatched', req.method, reply.statusCode);
    done();
  });

  app.get('/metrics', async (_req, reply) => {
    reply.type(metrics.registry.contentType);
    return await metrics.registry.metrics();
  });
});
