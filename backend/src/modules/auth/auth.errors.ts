/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: messages never reveal whether an email exists or why a token failed.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  duplicateEmail(meta?: AppErrorMeta) {
    return new AppError('DUPLICATE_EMAIL', 'Email already registered.', meta);
  },

  /** Login: wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return new AppError('INVALID_CREDENTIALS', 'Invalid email or password.', meta);
  },

  missingToken(meta?: AppErrorMeta) {
    return new AppError('MISSING_TOKEN', 'Refresh token is required.', meta);
  },

  /**
   * One error for every refresh failure (bad signature, expired, revoked,
   * replaced, owner gone) so a caller cannot tell which one applied.
   */
  invalidRefreshToken(meta?: AppErrorMeta) {
    return new AppError('INVALID_REFRESH_TOKEN', 'Invalid or expired refresh token.', meta);
  },

  unauthorized(meta?: AppErrorMeta) {
    return new AppError('UNAUTHORIZED', 'Could not validate credentials.', meta);
  },
} as const;
