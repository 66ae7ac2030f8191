/**
 * backend/src/shared/security/token-codec.ts
 *
 * WHY:
 * - One place that signs and verifies JWTs (jose, HMAC family).
 * - Access and refresh tokens share this codec; they differ only by the `type` claim
 *   and lifetime. Callers decide which `type` they accept.
 * - Secret + algorithm come in through TokenCodecConfig at construction time.
 *   The codec never reads env or globals.
 *
 * HOW TO USE:
 * - const codec = new TokenCodec({ secret, algorithm: 'HS256' })
 * - const { token, claims } = await codec.issue({ subject, email, kind: 'access', lifetimeSeconds: 900 })
 * - const result = await codec.verify(token)
 *     result.ok === true  → result.claims
 *     result.ok === false → result.reason ('expired' | 'malformed')
 *
 * RULES:
 * - verify() never throws for a bad token; it returns a failure outcome.
 *   Only non-token faults (bugs, broken runtime) propagate.
 * - A failure never carries partial claims.
 * - Failure reasons are for logs only. Never echo them to clients.
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, errors as joseErrors, jwtVerify } from 'jose';
import { z } from 'zod';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export const TOKEN_KINDS = ['access', 'refresh'] as const;
export type TokenKind = (typeof TOKEN_KINDS)[number];

export type TokenCodecConfig = Readonly<{
  secret: string;
  algorithm: JwtAlgorithm;
}>;

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  type: z.enum(TOKEN_KINDS),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

export type IssuedToken = {
  token: string;
  claims: TokenClaims;
};

export type TokenFailureReason = 'expired' | 'malformed';

export type TokenVerifyResult =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: TokenFailureReason };

export class TokenCodec {
  private readonly key: Uint8Array;
  private readonly algorithm: JwtAlgorithm;

  constructor(
    config: TokenCodecConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.key = new TextEncoder().encode(config.secret);
    this.algorithm = config.algorithm;
  }

  async issue(input: {
    subject: string;
    email: string;
    kind: TokenKind;
    lifetimeSeconds: number;
  }): Promise<IssuedToken> {
    const iat = Math.floor(this.clock().getTime() / 1000);
    const claims: TokenClaims = {
      sub: input.subject,
      email: input.email,
      type: input.kind,
      iat,
      exp: iat + input.lifetimeSeconds,
      // Distinguishes two tokens minted in the same second for the same user.
      jti: randomUUID(),
    };

    const token = await new SignJWT({ email: claims.email, type: claims.type })
      .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
      .setSubject(claims.sub)
      .setJti(claims.jti)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .sign(this.key);

    return { token, claims };
  }

  async verify(token: string): Promise<TokenVerifyResult> {
    let payload: unknown;
    try {
      const verified = await jwtVerify(token, this.key, {
        algorithms: [this.algorithm],
        currentDate: this.clock(),
      });
      payload = verified.payload;
    } catch (err) {
      if (err instanceof joseErrors.JWTExpired) return { ok: false, reason: 'expired' };
      if (err instanceof joseErrors.JOSEError) return { ok: false, reason: 'malformed' };
      throw err;
    }

    const parsed = tokenClaimsSchema.safeParse(payload);
    if (!parsed.success) return { ok: false, reason: 'malformed' };

    return { ok: true, claims: parsed.data };
  }
}
