import Fastify, { type FastifyInstance } from 'fastify';

import type { Env } from './config/env';
import type { AppServices } from './lib/services';
import errorsPlugin from './plugins/errors';
import featureGuard from './plugins/feature-guard';
import logging from './plugins/logging';
import metricsPlugin from './plugins/metrics';
import { registerRouteHandlers } from './routes/register-handlers';

export type BuildAppOptions = {
  services: AppServices;
  logLevel?: Env['LOG_LEVEL'];
};

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

export async function buildApp({ services, logLevel = 'silent' }: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: logLevel === 'silent' ? false : { level: logLevel } });
  app.decorate('services', services);

  // Register core plugins
  await app.register(logging);
  if (services.metrics) {
    await app.register(metricsPlugin, { metrics: services.metrics });
  }
  await app.register(errorsPlugin);

  // Register feature plugins
  await app.register(featureGuard, { flags: services.platforms.flags });

  await registerRouteHandlers(app);
  return app;
}
