import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { registerErrorHandler } from '../../../../src/shared/http/error-handler';
import { AppError } from '../../../../src/shared/http/errors';
import { registerRequestContext } from '../../../../src/shared/http/request-context';
import {
  readBearerToken,
  requireAuthUser,
  type BearerAuthenticator,
} from '../../../../src/shared/http/require-auth-user';
import type { User } from '../../../../src/modules/users';

const USER: User = {
  id: 'user-1',
  email: 'ada@example.com',
  name: 'Ada',
  createdAt: new Date('2030-01-01T00:00:00.000Z'),
  updatedAt: new Date('2030-01-01T00:00:00.000Z'),
};

/** Accepts exactly the token 'good-token'. Records what it was asked. */
class FakeAuthenticator implements BearerAuthenticator {
  readonly seen: Array<string | null> = [];

  async authenticateRequest(bearerToken: string | null): Promise<User> {
    this.seen.push(bearerToken);
    if (bearerToken !== 'good-token') throw new AppError('UNAUTHORIZED', 'No entry.');
    return USER;
  }
}

async function buildProbeApp(authenticator: BearerAuthenticator): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  registerRequestContext(app);
  registerErrorHandler(app);

  app.get('/token', async (req) => ({ token: readBearerToken(req) }));
  app.get('/me', async (req) => {
    const user = await requireAuthUser(req, authenticator);
    return { userId: user.id, contextUserId: req.requestContext.userId };
  });

  await app.ready();
  return app;
}

describe('readBearerToken', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it.each([
    ['Bearer abc.def.ghi', 'abc.def.ghi'],
    ['bearer abc', 'abc'],
    ['BEARER   abc  ', 'abc'],
    ['Basic abc', null],
    ['Bearer', null],
    ['Bearer a b', null],
  ])('parses %j as %j', async (header, expected) => {
    app = await buildProbeApp(new FakeAuthenticator());

    const res = await app.inject({ method: 'GET', url: '/token', headers: { authorization: header } });
    expect(res.json()).toEqual({ token: expected });
  });

  it('returns null without an Authorization header', async () => {
    app = await buildProbeApp(new FakeAuthenticator());

    const res = await app.inject({ method: 'GET', url: '/token' });
    expect(res.json()).toEqual({ token: null });
  });
});

describe('requireAuthUser', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('returns the authenticated user and records it on the request context', async () => {
    const authenticator = new FakeAuthenticator();
    app = await buildProbeApp(authenticator);

    const res = await app.inject({
      method: 'GET',
      url: '/me',
      headers: { authorization: 'Bearer good-token' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ userId: 'user-1', contextUserId: 'user-1' });
    expect(authenticator.seen).toEqual(['good-token']);
  });

  it('passes null to the authenticator when no token is present and surfaces its 401', async () => {
    const authenticator = new FakeAuthenticator();
    app = await buildProbeApp(authenticator);

    const res = await app.inject({ method: 'GET', url: '/me' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'No entry.' } });
    expect(authenticator.seen).toEqual([null]);
  });
});
