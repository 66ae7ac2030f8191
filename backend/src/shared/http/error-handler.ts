/**
 * backend/src/shared/http/error-handler.ts
 *
 * Maps anything thrown by a route to the `{ error: { code, message } }` wire shape.
 *
 * | thrown                              | status       | code             |
 * |-------------------------------------|--------------|------------------|
 * | AppError                            | from code    | its code         |
 * | RateLimitError                      | 429          | RATE_LIMITED     |
 * | ZodError (escaped a controller)     | 422          | VALIDATION_ERROR |
 * | Fastify 4xx (media type, body size) | its own      | BAD_REQUEST      |
 * | anything else (store faults, bugs)  | 500          | INTERNAL         |
 *
 * Meta, decode diagnostics and stacks go to the log only.
 */

import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';

import { AppError, type AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { requestLogger } from '../logger/request-logger';

export type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

export type MappedError = {
  status: number;
  body: ErrorResponseBody;
  headers: Record<string, string>;
  log: {
    level: 'warn' | 'error';
    event: string;
    detail: Record<string, unknown>;
  };
};

function errorBody(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function clientStatusOf(err: unknown): number | null {
  if (!(err instanceof Error) || !('statusCode' in err)) return null;
  const { statusCode } = err;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500
    ? statusCode
    : null;
}

export function mapError(err: unknown): MappedError {
  if (err instanceof AppError) {
    return {
      status: err.status,
      body: errorBody(err.code, err.message),
      headers: {},
      log: {
        level: 'warn',
        event: 'app_error',
        detail: { code: err.code, status: err.status, message: err.message, meta: err.meta },
      },
    };
  }

  if (err instanceof RateLimitError) {
    return {
      status: 429,
      body: errorBody('RATE_LIMITED', 'Too many requests. Try again later.'),
      headers: { 'retry-after': String(err.retryAfterSeconds) },
      log: {
        level: 'warn',
        event: 'rate_limited',
        detail: {
          key: err.key,
          limit: err.rule.limit,
          windowSeconds: err.rule.windowSeconds,
          retryAfterSeconds: err.retryAfterSeconds,
        },
      },
    };
  }

  if (err instanceof ZodError) {
    return {
      status: 422,
      body: errorBody('VALIDATION_ERROR', 'Invalid request.'),
      headers: {},
      log: { level: 'warn', event: 'validation_error', detail: { issues: err.issues } },
    };
  }

  const clientStatus = clientStatusOf(err);
  if (clientStatus !== null && err instanceof Error) {
    return {
      status: clientStatus,
      body: errorBody('BAD_REQUEST', 'Malformed request.'),
      headers: {},
      log: { level: 'warn', event: 'client_error', detail: { message: err.message } },
    };
  }

  return {
    status: 500,
    body: errorBody('INTERNAL', 'Internal server error.'),
    headers: {},
    log: {
      level: 'error',
      event: 'unhandled_error',
      detail: {
        message: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      },
    },
  };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err, req, reply) => {
    const mapped = mapError(err);

    requestLogger(req).log(mapped.log.level, mapped.log.event, {
      flow: 'http.error',
      ...mapped.log.detail,
    });

    return reply.status(mapped.status).headers(mapped.headers).send(mapped.body);
  });

  app.setNotFoundHandler((_req, reply) => {
    return reply.status(404).send(errorBody('NOT_FOUND', 'Route not found.'));
  });
}
