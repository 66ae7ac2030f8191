/**
 * backend/src/shared/http/require-auth-user.ts
 *
 * WHY:
 * - Controllers must not duplicate "read bearer token → authenticate" logic.
 * - Centralizes the Authorization header parsing so every protected endpoint
 *   rejects the same malformed inputs the same way.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch the store directly: the authenticator owns the lookup.
 * - Failures are AppErrors thrown by the authenticator, mapped by error-handler.
 */

import type { FastifyRequest } from 'fastify';
import type { User } from '../../modules/users';

export interface BearerAuthenticator {
  authenticateRequest(bearerToken: string | null): Promise<User>;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Extracts the token from `Authorization: Bearer <token>`.
 * Returns null when the header is absent, uses another scheme, or carries no token.
 */
export function readBearerToken(req: FastifyRequest): string | null {
  const header = req.headers.authorization;
  if (typeof header !== 'string') return null;

  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

/**
 * Controller guard: requires a valid access token and returns the live user.
 * Also records userId on the request context so later log lines carry it.
 */
export async function requireAuthUser(
  req: FastifyRequest,
  authenticator: BearerAuthenticator,
): Promise<User> {
  const user = await authenticator.authenticateRequest(readBearerToken(req));
  req.requestContext.userId = user.id;
  return user;
}
