/**
 * backend/src/shared/http/request-context.ts
 *
 * Per-request context shared by logging and error handling.
 *
 * - requestId: Fastify's own request id (see generateRequestId), echoed back in
 *   the x-request-id response header.
 * - userId: null until requireAuthUser() accepts a bearer token.
 */

import type { IncomingHttpHeaders } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

export type RequestContext = {
  requestId: string;
  userId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

/**
 * Fastify `genReqId`. An upstream x-request-id is kept when it looks sane;
 * anything else is replaced with a UUID.
 */
export function generateRequestId(req: { headers: IncomingHttpHeaders }): string {
  const incoming = req.headers[REQUEST_ID_HEADER];
  if (typeof incoming === 'string') {
    const trimmed = incoming.trim();
    if (REQUEST_ID_PATTERN.test(trimmed)) return trimmed;
  }
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance): void {
  app.decorateRequest('requestContext', null);

  app.addHook('onRequest', async (req, reply) => {
    req.requestContext = { requestId: req.id, userId: null };
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
