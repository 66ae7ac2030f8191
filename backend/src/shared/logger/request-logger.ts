/**
 * backend/src/shared/logger/request-logger.ts
 *
 * Child logger bound to one request: every line carries requestId, and userId
 * once requireAuthUser() has accepted a bearer token.
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function requestLogger(req: FastifyRequest): Logger {
  return logger.child({
    requestId: req.id,
    userId: req.requestContext?.userId ?? null,
  });
}
