import fp from 'fastify-plugin';
import type { FastifyError } from 'fastify';
import { ZodError } from 'zod';

import { RateLimitedError, TransferError } from '@tracklift/contracts';

import { ProblemError, toProblemBody, type ProblemOptions } from '../lib/problem';
import { resolveRequestId } from '../lib/request-id';

const DEFAULT_ERROR_CODES: Record<number, string> = {
  400: 'bad_request',
  401: 'unauthorized',
  403: 'forbidden',
  404: 'not_found',
  409: 'conflict',
  413: 'payload_too_large',
  415: 'unsupported_media_type',
  422: 'unprocessable_entity',
  429: 'rate_limited',
  502: 'bad_gateway',
  503: 'service_unavailable',
};

function toProblem(err: FastifyError | Error): ProblemOptions {
  if (err instanceof TransferError || err instanceof ProblemError) {
    const status = err instanceof TransferError ? err.status : err.statusCode;
    return { status, code: err.code, message: err.message, details: err.details };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      code: 'invalid_transfer_request',
      message: 'Request validation failed',
      details: {
        issues: err.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    };
  }

  const statusCode = 'statusCode' in err ? err.statusCode : undefined;
  const status = typeof statusCode === 'number' && statusCode >= 400 ? statusCode : 500;
  return {
    status,
    code: DEFAULT_ERROR_CODES[status] ?? 'internal',
    message: status >= 500 ? 'Internal Server Error' : err.message,
  };
}

export default fp(async (app) => {
  app.setNotFoundHandler((req, reply) => {
    const status = 404;
    const requestId = resolveRequestId(req);
    reply.header('x-request-id', requestId);
    const body = toProblemBody({
      status,
      code: 'not_found',
      message: `Route ${req.method}:${req.url} not found`,
      requestId,
    });
    reply.status(status).send(body);
  });

  app.setErrorHandler((err: FastifyError | Error, req, reply) => {
    const requestId = resolveRequestId(req);
    const problem = toProblem(err);

    if (problem.status >= 500) {
      req.log.error({ err, requestId }, 'request failed');
    } else {
      req.log.info({ code: problem.code, requestId }, problem.message);
    }

    reply.header('x-request-id', requestId);
    if (err instanceof RateLimitedError) {
      reply.header('retry-after', String(Math.max(1, Math.ceil(err.retryAfterMs / 1000))));
    }
    reply.status(problem.status).send(toProblemBody({ ...problem, requestId }));
  });
});
