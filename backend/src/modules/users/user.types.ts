/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user. Emails are stored and compared exactly as given.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - passwordHash only travels on UserCredentials; User never carries it.
 */

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  name: string;

  createdAt: Date;
  updatedAt: Date;
};

export type UserCredentials = {
  user: User;
  passwordHash: string;
};

export type NewUser = {
  id: UserId;
  email: string;
  name: string;
  passwordHash: string;
};
