import type { FastifyInstance, RouteHandlerMethod } from 'fastify';

import healthGet from './health.get';
import platformsGet from './platforms.get';
import rateLimitGet from './rate-limit.get';
import transfersPost from './transfers.post';

export type RouteDefinition = {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  url: string;
  handler: RouteHandlerMethod;
};

const ROUTES: RouteDefinition[] = [
  { method: 'POST', url: '/transfers',  handler: transfersPost },
  { method: 'GET',  url: '/rate-limit', handler: rateLimitGet },
  { method: 'GET',  url: '/platforms',  handler: platformsGet },
  { method: 'GET',  url: '/health',     handler: healthGet },
];

export async function registerRouteHandlers(app: FastifyInstance): Promise<void> {
  for (const route of ROUTES) {
    app.route({
      method: route.method,
      url: route.url,
      handler: route.handler,
    });
  }
}
