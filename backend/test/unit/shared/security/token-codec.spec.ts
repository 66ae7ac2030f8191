import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { TokenCodec } from '../../../../src/shared/security/token-codec';

const SECRET = 'test-secret-for-signing-tokens';
const T0 = new Date('2030-01-01T00:00:00.000Z');
const T0_SECONDS = Math.floor(T0.getTime() / 1000);

function codecAt(now: () => Date, opts: { secret?: string; algorithm?: 'HS256' | 'HS384' } = {}) {
  return new TokenCodec(
    { secret: opts.secret ?? SECRET, algorithm: opts.algorithm ?? 'HS256' },
    now,
  );
}

describe('TokenCodec', () => {
  it('issues a token whose verified claims match what was issued', async () => {
    const codec = codecAt(() => T0);

    const issued = await codec.issue({
      subject: 'user-1',
      email: 'ada@example.com',
      kind: 'access',
      lifetimeSeconds: 900,
    });

    expect(issued.claims.sub).toBe('user-1');
    expect(issued.claims.email).toBe('ada@example.com');
    expect(issued.claims.type).toBe('access');
    expect(issued.claims.iat).toBe(T0_SECONDS);
    expect(issued.claims.exp).toBe(T0_SECONDS + 900);

    const verified = await codec.verify(issued.token);
    expect(verified).toEqual({ ok: true, claims: issued.claims });
  });

  it('gives every token a distinct jti', async () => {
    const codec = codecAt(() => T0);
    const input = { subject: 'user-1', email: 'a@b.c', kind: 'refresh' as const, lifetimeSeconds: 60 };

    const a = await codec.issue(input);
    const b = await codec.issue(input);

    expect(a.claims.jti).not.toBe(b.claims.jti);
    expect(a.token).not.toBe(b.token);
  });

  it('verifies the same token twice with identical results', async () => {
    const codec = codecAt(() => T0);
    const { token } = await codec.issue({
      subject: 'user-1',
      email: 'a@b.c',
      kind: 'access',
      lifetimeSeconds: 60,
    });

    expect(await codec.verify(token)).toEqual(await codec.verify(token));
  });

  it('reports expired once the clock passes exp', async () => {
    let now = T0;
    const codec = codecAt(() => now);
    const { token } = await codec.issue({
      subject: 'user-1',
      email: 'a@b.c',
      kind: 'access',
      lifetimeSeconds: 60,
    });

    now = new Date(T0.getTime() + 59 * 1000);
    expect((await codec.verify(token)).ok).toBe(true);

    now = new Date(T0.getTime() + 61 * 1000);
    expect(await codec.verify(token)).toEqual({ ok: false, reason: 'expired' });
  });

  it('reports malformed for a token signed with another secret', async () => {
    const issuer = codecAt(() => T0, { secret: 'test-secret-other-signing-key' });
    const { token } = await issuer.issue({
      subject: 'user-1',
      email: 'a@b.c',
      kind: 'access',
      lifetimeSeconds: 60,
    });

    expect(await codecAt(() => T0).verify(token)).toEqual({ ok: false, reason: 'malformed' });
  });

  it('reports malformed for a tampered payload', async () => {
    const codec = codecAt(() => T0);
    const { token } = await codec.issue({
      subject: 'user-1',
      email: 'a@b.c',
      kind: 'access',
      lifetimeSeconds: 60,
    });

    const [header, , signature] = token.split('.');
    const forgedPayload = Buffer.from(
      JSON.stringify({ sub: 'user-2', email: 'a@b.c', type: 'access', iat: T0_SECONDS, exp: T0_SECONDS + 60, jti: 'x' }),
    ).toString('base64url');

    expect(await codec.verify(`${header}.${forgedPayload}.${signature}`)).toEqual({
      ok: false,
      reason: 'malformed',
    });
  });

  it('reports malformed for a token signed with a different algorithm', async () => {
    const hs384 = codecAt(() => T0, { algorithm: 'HS384' });
    const { token } = await hs384.issue({
      subject: 'user-1',
      email: 'a@b.c',
      kind: 'access',
      lifetimeSeconds: 60,
    });

    expect(await codecAt(() => T0).verify(token)).toEqual({ ok: false, reason: 'malformed' });
  });

  it('reports malformed for a correctly signed token missing required claims', async () => {
    const token = await new SignJWT({ email: 'a@b.c' })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('user-1')
      .setIssuedAt(T0_SECONDS)
      .setExpirationTime(T0_SECONDS + 60)
      .sign(new TextEncoder().encode(SECRET));

    expect(await codecAt(() => T0).verify(token)).toEqual({ ok: false, reason: 'malformed' });
  });

  it.each(['', 'not-a-jwt', 'a.b.c'])('reports malformed for %j', async (token) => {
    expect(await codecAt(() => T0).verify(token)).toEqual({ ok: false, reason: 'malformed' });
  });
});
