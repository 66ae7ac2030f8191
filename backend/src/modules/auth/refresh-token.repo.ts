/**
 * src/modules/auth/refresh-token.repo.ts
 *
 * WHY:
 * - The store is the revocation authority for refresh tokens: a token with a
 *   valid signature is only honoured while its row exists.
 *
 * RULES:
 * - At most one row per user. replaceForUser is a single atomic upsert keyed
 *   on user_id, so two concurrent logins can never leave two live tokens.
 * - No AppError.
 */

import type { RefreshTokenRecord } from './auth.types';

export type NewRefreshToken = {
  id: string;
  userId: string;
  token: string;
  expiresAt: Date;
  createdAt: Date;
};

export interface RefreshTokenRepo {
  replaceForUser(input: NewRefreshToken): Promise<RefreshTokenRecord>;
  findByToken(token: string): Promise<RefreshTokenRecord | undefined>;
  deleteById(id: string): Promise<void>;
  /** Returns the number of rows removed (0 or 1). */
  deleteForUser(userId: string): Promise<number>;
}
