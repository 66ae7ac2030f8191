/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for the Auth module.
 * - RefreshTokenRecord is the stored (revocable) copy of an issued refresh token.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Never include raw passwords or hashes in response types.
 */

import type { User } from '../users';

export type RefreshTokenRecord = {
  id: string;
  userId: string;
  token: string;
  expiresAt: Date;
  createdAt: Date;
};

export type LoginResult = {
  user: User;
  accessToken: string;
  refreshToken: string;
  refreshExpiresAt: Date;
};

export type RotateResult = {
  accessToken: string;
};

/** Wire shape for POST /auth/login. */
export type TokenPairResponse = {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
};

/** Wire shape for POST /auth/refresh. */
export type AccessTokenResponse = {
  access_token: string;
  token_type: 'bearer';
};

/** Wire shape for POST /auth/register. */
export type RegisteredUserResponse = {
  id: string;
  name: string;
  email: string;
};
