import fastify, { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { describe, expect, it } from 'vitest';

import { AppendFailedError, InvalidUrlError, RateLimitedError } from '@tracklift/contracts';

import { problem } from '../../lib/problem';
import errorsPlugin from '../errors';

async function buildApp(registerRoutes?: (app: FastifyInstance) => Promise<void> | void) {
  const app = fastify({ logger: false });
  await app.register(errorsPlugin);
  if (registerRoutes) {
    await registerRoutes(app);
  }
  await app.ready();
  return app;
}

describe('errors plugin', () => {
  it('echoes the x-request-id header in error responses', async () => {
    const app = await buildApp((instance) => {
      instance.get('/echo-request-id', async () => {
        throw new InvalidUrlError('Not a valid URL: nope');
      });
    });

    try {
      const response = await app.inject({
        method: 'GET',
        url: '/echo-request-id',
        headers: { 'x-request-id': 'req_test123' },
      });
      expect(response.statusCode).toBe(400);
      expect(response.headers['x-request-id']).toBe('req_test123');
      expect(response.json()).toEqual({
        type: 'about:blank',
        code: 'invalid_url',
        message: 'Not a valid URL: nope',
        details: { request_id: 'req_test123' },
      });
    } finally {
      await app.close();
    }
  });

  it('renders transfer errors with their code, status and details', async () => {
    const app = await buildApp((instance) => {
      instance.get('/append', async () => {
        throw new AppendFailedError('spotify', 'Could not add 2 matched tracks', { matched: 2, playlistId: 'pl-1' });
      });
    });

    try {
      const response = await app.inject({ method: 'GET', url: '/append', headers: { 'x-request-id': 'req_append' } });
      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        type: 'about:blank',
        code: 'append_failed',
        message: 'Could not add 2 matched tracks',
        details: { platform: 'spotify', matched: 2, playlist_id: 'pl-1', request_id: 'req_append' },
      });
    } finally {
      await app.close();
    }
  });

  it('sets retry-after in whole seconds for rate-limit denials', async () => {
    const app = await buildApp((instance) => {
      instance.get('/limited', async () => {
        throw new RateLimitedError('Rate limit exceeded. Max 3 requests per 60 minutes.', 90_500);
      });
    });

    try {
      const response = await app.inject({ method: 'GET', url: '/limited' });
      expect(response.statusCode).toBe(429);
      expect(response.headers['retry-after']).toBe('91');
      expect(response.json().details).toMatchObject({ retry_after_ms: 90_500 });
    } finally {
      await app.close();
    }
  });

  it('maps zod failures to invalid_transfer_request', async () => {
    const app = await buildApp((instance) => {
      instance.post('/validate', async (req) => z.object({ url: z.string() }).parse(req.body));
    });

    try {
      const response = await app.inject({ method: 'POST', url: '/validate', payload: { url: 42 } });
      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.code).toBe('invalid_transfer_request');
      expect(body.details.issues).toEqual([{ path: 'url', message: 'Expected string, received number' }]);
    } finally {
      await app.close();
    }
  });

  it('passes problem errors through', async () => {
    const app = await buildApp((instance) => {
      instance.get('/disabled', async () => {
        throw problem({ status: 503, code: 'platform_disabled', message: 'youtube platform is disabled' });
      });
    });

    try {
      const response = await app.inject({ method: 'GET', url: '/disabled' });
      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ code: 'platform_disabled', message: 'youtube platform is disabled' });
    } finally {
      await app.close();
    }
  });

  it('maps generic Fastify errors to default error codes', async () => {
    const app = await buildApp((instance) => {
      instance.post('/json', async () => ({ ok: true }));
    });

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/json',
        headers: { 'content-type': 'application/json' },
        payload: '{not json',
      });
      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('bad_request');
    } finally {
      await app.close();
    }
  });

  it('hides the message of unexpected failures', async () => {
    const app = await buildApp((instance) => {
      instance.get('/boom', async () => {
        throw new Error('database password is test-secret');
      });
    });

    try {
      const response = await app.inject({ method: 'GET', url: '/boom' });
      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({ code: 'internal', message: 'Internal Server Error' });
    } finally {
      await app.close();
    }
  });

  it('formats unknown routes as not_found problems', async () => {
    const app = await buildApp();

    try {
      const response = await app.inject({ method: 'GET', url: '/__missing__' });
      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body).toMatchObject({ type: 'about:blank', code: 'not_found', message: 'Route GET:/__missing__ not found' });
      expect(body.details.request_id).toMatch(/^req_/);
    } finally {
      await app.close();
    }
  });
});
