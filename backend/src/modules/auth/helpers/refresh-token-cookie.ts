/**
 * src/modules/auth/helpers/refresh-token-cookie.ts
 *
 * WHY:
 * - Login sets, logout clears, and refresh reads the same cookie. The flags live
 *   in one place so they cannot drift between handlers.
 *
 * RULES:
 * - Path=/auth: the cookie only travels to auth endpoints.
 * - HttpOnly; Secure; SameSite=Strict always.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

export const REFRESH_TOKEN_COOKIE_NAME = 'refresh_token';

const COOKIE_FLAGS = ['Path=/auth', 'HttpOnly', 'Secure', 'SameSite=Strict'];

export function setRefreshTokenCookie(
  reply: FastifyReply,
  token: string,
  maxAgeSeconds: number,
): void {
  const parts = [`${REFRESH_TOKEN_COOKIE_NAME}=${token}`, ...COOKIE_FLAGS, `Max-Age=${maxAgeSeconds}`];
  reply.header('Set-Cookie', parts.join('; '));
}

export function clearRefreshTokenCookie(reply: FastifyReply): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  const parts = [`${REFRESH_TOKEN_COOKIE_NAME}=`, ...COOKIE_FLAGS, 'Max-Age=0'];
  reply.header('Set-Cookie', parts.join('; '));
}

function parseCookies(raw: string | undefined): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!raw) return cookies;

  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies.set(key, value);
  }
  return cookies;
}

export function readRefreshTokenCookie(req: FastifyRequest): string | null {
  const value = parseCookies(req.headers.cookie).get(REFRESH_TOKEN_COOKIE_NAME);
  return value ? value : null;
}
