/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts. Routes are registered afterwards by app/routes.ts.
 */

import Fastify from 'fastify';

import { generateRequestId, registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerJsonBodyParser } from '../shared/http/json-body';
import { requestLogger } from '../shared/logger/request-logger';

export async function buildServer() {
  const app = Fastify({
    logger: false, // winston instead of pino
    requestIdHeader: false,
    genReqId: generateRequestId,
  });

  registerRequestContext(app);
  registerErrorHandler(app);
  registerJsonBodyParser(app);

  // One access line per request, written after the response so it has the status.
  app.addHook('onResponse', async (req, reply) => {
    requestLogger(req).info('request.completed', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
    });
  });

  return app;
}
