/**
 * backend/src/modules/users/user.repo.ts
 *
 * WHY:
 * - The one contract services use to read and write users.
 * - PostgreSQL in production (dal/kysely-user.repo.ts), in-memory in tests
 *   (dal/inmem-user.repo.ts).
 *
 * RULES:
 * - No AppError. Business outcomes are return values (null / undefined).
 */

import type { NewUser, User, UserCredentials } from './user.types';

export interface UserRepo {
  findById(id: string): Promise<User | undefined>;

  /** Exact match on email (case-sensitive). */
  findCredentialsByEmail(email: string): Promise<UserCredentials | undefined>;

  /**
   * Insert-if-absent keyed on email.
   * Returns null when the email is already taken (nothing is written).
   */
  insertUser(input: NewUser): Promise<User | null>;
}
