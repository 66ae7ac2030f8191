import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

export const TokenPairSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  token_type: z.literal('bearer'),
});

export const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export const DEFAULT_PASSWORD = 'test-password-1';

/** Registers a user over HTTP and logs in. Fails the test on any non-2xx. */
export async function registerAndLogin(
  app: FastifyInstance,
  input: { email: string; name?: string; password?: string },
) {
  const password = input.password ?? DEFAULT_PASSWORD;

  const registered = await app.inject({
    method: 'POST',
    url: '/auth/register',
    payload: { name: input.name ?? 'Test User', email: input.email, password },
  });
  if (registered.statusCode !== 201) {
    throw new Error(`register failed: ${registered.statusCode} ${registered.body}`);
  }

  const login = await app.inject({
    method: 'POST',
    url: '/auth/login',
    payload: { email: input.email, password },
  });
  if (login.statusCode !== 200) {
    throw new Error(`login failed: ${login.statusCode} ${login.body}`);
  }

  const userId = z.object({ id: z.string() }).parse(registered.json()).id;
  const tokens = TokenPairSchema.parse(login.json());

  return {
    userId,
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token,
  };
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
