/**
 * backend/src/shared/http/json-body.ts
 *
 * Replaces Fastify's application/json parser with one that reads an empty body
 * as "no body". Routes whose body is optional (POST /auth/refresh) then reach
 * their own validation instead of failing in the parser.
 *
 * Non-empty bodies are parsed with the same prototype-poisoning rules as the
 * default parser. Unparseable JSON is 400 BAD_REQUEST.
 */

import type { FastifyInstance } from 'fastify';
import sjson from 'secure-json-parse';

import { AppError } from './errors';

export function parseJsonBody(body: string): unknown {
  if (body.trim() === '') return undefined;

  try {
    const parsed: unknown = sjson.parse(body, undefined, {
      protoAction: 'error',
      constructorAction: 'error',
    });
    return parsed;
  } catch (err: unknown) {
    throw new AppError('BAD_REQUEST', 'Malformed request.', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

export function registerJsonBodyParser(app: FastifyInstance): void {
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser<string>('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, parseJsonBody(body));
    } catch (err: unknown) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });
}
