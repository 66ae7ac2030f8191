/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Owns the credential lifecycle: register, authenticate, login (token pair),
 *   refresh (new access token) and logout (revoke the stored refresh token).
 *
 * RULES:
 * - No raw DB access: everything goes through UserRepo / RefreshTokenRepo.
 * - Never store/log raw passwords or tokens. Emails are logged as domain only.
 * - Rate limit at the start of each public flow (before any store work).
 * - Store faults are not caught here; the HTTP error handler answers 500.
 *
 * REFRESH:
 * - A refresh token is honoured only while its stored row exists, belongs to the
 *   token's subject, and has not passed expires_at. Signature validity alone is
 *   never enough.
 * - An expired token (JWT exp or stored expires_at) deletes its stored row.
 * - The refresh token is not rotated: refresh returns a new access token only.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import { emailDomain } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter, RateLimitRule } from '../../shared/security/rate-limit';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { User, UserRepo } from '../users';

import { AuthErrors } from './auth.errors';
import type { LoginResult, RotateResult } from './auth.types';
import type { RefreshTokenRepo } from './refresh-token.repo';

// ── Params ──────────────────────────────────────────────────

type RequestMeta = {
  ip: string;
  requestId: string;
};

export type RegisterParams = RequestMeta & {
  name: string;
  email: string;
  password: string;
};

export type LoginParams = RequestMeta & {
  email: string;
  password: string;
};

export type RotateParams = RequestMeta & {
  refreshToken: string;
};

export type TokenLifetimes = {
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
};

// ── Rate-limit constants ────────────────────────────────────

const REGISTER_LIMIT_PER_IP: RateLimitRule = { limit: 5, windowSeconds: 60 };
const LOGIN_LIMIT_PER_IP: RateLimitRule = { limit: 5, windowSeconds: 60 };
const REFRESH_LIMIT_PER_IP: RateLimitRule = { limit: 10, windowSeconds: 60 };

// ── Service ─────────────────────────────────────────────────

export class AuthService {
  private readonly clock: () => Date;

  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      refreshTokenRepo: RefreshTokenRepo;
      tokenCodec: TokenCodec;
      passwordHasher: PasswordHasher;
      rateLimiter: RateLimiter;
      logger: Logger;
      lifetimes: TokenLifetimes;
      clock?: () => Date;
    },
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  // ── Register ─────────────────────────────────────────────

  async register(params: RegisterParams): Promise<User> {
    const flow = 'auth.register';

    this.deps.logger.info({
      msg: 'auth.register.start',
      flow,
      requestId: params.requestId,
      emailDomain: emailDomain(params.email),
    });

    await this.deps.rateLimiter.hitOrThrow(`register:ip:${params.ip}`, REGISTER_LIMIT_PER_IP);

    const existing = await this.deps.userRepo.findCredentialsByEmail(params.email);
    if (existing) {
      this.deps.logger.warn({ msg: 'auth.register.duplicate_email', flow, requestId: params.requestId });
      throw AuthErrors.duplicateEmail();
    }

    const passwordHash = await this.deps.passwordHasher.hash(params.password);

    // Insert-if-absent: a concurrent register for the same email that won the
    // race leaves us with null, reported exactly like the pre-check above.
    const user = await this.deps.userRepo.insertUser({
      id: randomUUID(),
      email: params.email,
      name: params.name,
      passwordHash,
    });

    if (!user) {
      this.deps.logger.warn({
        msg: 'auth.register.duplicate_email',
        flow,
        requestId: params.requestId,
        race: true,
      });
      throw AuthErrors.duplicateEmail();
    }

    this.deps.logger.info({
      msg: 'auth.register.success',
      flow,
      requestId: params.requestId,
      userId: user.id,
    });

    return user;
  }

  // ── Authenticate ─────────────────────────────────────────

  /**
   * Unknown email and wrong password produce the same error, and both paths
   * run one bcrypt comparison.
   */
  async authenticate(email: string, password: string): Promise<User> {
    const credentials = await this.deps.userRepo.findCredentialsByEmail(email);

    if (!credentials) {
      await this.deps.passwordHasher.verifyAgainstDecoy(password);
      throw AuthErrors.invalidCredentials();
    }

    const ok = await this.deps.passwordHasher.verify(password, credentials.passwordHash);
    if (!ok) throw AuthErrors.invalidCredentials();

    return credentials.user;
  }

  // ── Login ────────────────────────────────────────────────

  async login(params: LoginParams): Promise<LoginResult> {
    const flow = 'auth.login';

    await this.deps.rateLimiter.hitOrThrow(`login:ip:${params.ip}`, LOGIN_LIMIT_PER_IP);

    let user: User;
    try {
      user = await this.authenticate(params.email, params.password);
    } catch (err) {
      this.deps.logger.warn({
        msg: 'auth.login.failed',
        flow,
        requestId: params.requestId,
        emailDomain: emailDomain(params.email),
      });
      throw err;
    }

    const { lifetimes, tokenCodec } = this.deps;

    const access = await tokenCodec.issue({
      subject: user.id,
      email: user.email,
      kind: 'access',
      lifetimeSeconds: lifetimes.accessTokenTtlSeconds,
    });

    const refresh = await tokenCodec.issue({
      subject: user.id,
      email: user.email,
      kind: 'refresh',
      lifetimeSeconds: lifetimes.refreshTokenTtlSeconds,
    });

    const stored = await this.deps.refreshTokenRepo.replaceForUser({
      id: randomUUID(),
      userId: user.id,
      token: refresh.token,
      expiresAt: new Date(refresh.claims.exp * 1000),
      createdAt: this.clock(),
    });

    this.deps.logger.info({
      msg: 'auth.login.success',
      flow,
      requestId: params.requestId,
      userId: user.id,
    });

    return {
      user,
      accessToken: access.token,
      refreshToken: refresh.token,
      refreshExpiresAt: stored.expiresAt,
    };
  }

  // ── Refresh ──────────────────────────────────────────────

  async rotate(params: RotateParams): Promise<RotateResult> {
    const flow = 'auth.refresh';

    await this.deps.rateLimiter.hitOrThrow(`refresh:ip:${params.ip}`, REFRESH_LIMIT_PER_IP);

    const reject = (reason: string, userId?: string): never => {
      this.deps.logger.warn({
        msg: 'auth.refresh.rejected',
        flow,
        requestId: params.requestId,
        reason,
        userId,
      });
      throw AuthErrors.invalidRefreshToken();
    };

    const verified = await this.deps.tokenCodec.verify(params.refreshToken);
    if (!verified.ok) {
      // The JWT and its stored row expire together, so a naturally expired token
      // is the usual way a stale row is found. Exact-string match: a forged
      // token can never select a row.
      if (verified.reason === 'expired') {
        const stale = await this.deps.refreshTokenRepo.findByToken(params.refreshToken);
        if (stale) await this.deps.refreshTokenRepo.deleteById(stale.id);
      }
      return reject(verified.reason);
    }

    const { claims } = verified;
    if (claims.type !== 'refresh') return reject('wrong_type', claims.sub);

    const user = await this.deps.userRepo.findById(claims.sub);
    if (!user) return reject('user_missing', claims.sub);

    const stored = await this.deps.refreshTokenRepo.findByToken(params.refreshToken);
    if (!stored) return reject('not_stored', user.id);
    if (stored.userId !== user.id) return reject('owner_mismatch', user.id);

    if (stored.expiresAt.getTime() < this.clock().getTime()) {
      await this.deps.refreshTokenRepo.deleteById(stored.id);
      return reject('stored_expired', user.id);
    }

    const access = await this.deps.tokenCodec.issue({
      subject: user.id,
      email: user.email,
      kind: 'access',
      lifetimeSeconds: this.deps.lifetimes.accessTokenTtlSeconds,
    });

    this.deps.logger.info({
      msg: 'auth.refresh.success',
      flow,
      requestId: params.requestId,
      userId: user.id,
    });

    return { accessToken: access.token };
  }

  // ── Logout ───────────────────────────────────────────────

  async logout(user: User, requestId: string): Promise<void> {
    const removed = await this.deps.refreshTokenRepo.deleteForUser(user.id);

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId,
      userId: user.id,
      revoked: removed,
    });
  }
}
