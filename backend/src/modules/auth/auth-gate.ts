/**
 * src/modules/auth/auth-gate.ts
 *
 * WHY:
 * - Turns a bearer access token into the live User row for protected endpoints.
 *
 * RULES:
 * - Missing token, bad/expired token, non-access token or unknown subject all
 *   yield the same UNAUTHORIZED error. The reason is logged (debug), never returned.
 * - Exactly one user lookup per call.
 */

import type { Logger } from '../../shared/logger/logger';
import type { BearerAuthenticator } from '../../shared/http/require-auth-user';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { User, UserRepo } from '../users';

import { AuthErrors } from './auth.errors';

export class AuthGate implements BearerAuthenticator {
  constructor(
    private readonly deps: {
      tokenCodec: TokenCodec;
      userRepo: UserRepo;
      logger: Logger;
    },
  ) {}

  async authenticateRequest(bearerToken: string | null): Promise<User> {
    if (!bearerToken) return this.reject('missing_token');

    const verified = await this.deps.tokenCodec.verify(bearerToken);
    if (!verified.ok) return this.reject(verified.reason);
    if (verified.claims.type !== 'access') return this.reject('wrong_type');

    const user = await this.deps.userRepo.findById(verified.claims.sub);
    if (!user) return this.reject('user_missing');

    return user;
  }

  private reject(reason: string): never {
    this.deps.logger.debug({ msg: 'auth.gate.rejected', flow: 'auth.gate', reason });
    throw AuthErrors.unauthorized();
  }
}
