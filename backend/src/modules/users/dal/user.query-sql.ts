/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - Raw Kysely access for users.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/database.schema';
import type { NewUser } from '../user.types';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('email', '=', email).executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

/**
 * INSERT ... ON CONFLICT (email) DO NOTHING RETURNING *
 * A lost race on the same email yields no row instead of a unique-violation.
 */
export function insertUserIfAbsentQuery(db: DbExecutor, input: NewUser) {
  return db
    .insertInto('users')
    .values({
      id: input.id,
      email: input.email,
      name: input.name,
      password_hash: input.passwordHash,
    })
    .onConflict((oc) => oc.column('email').doNothing())
    .returningAll();
}

export async function insertUserIfAbsentSql(
  db: DbExecutor,
  input: NewUser,
): Promise<UserRow | undefined> {
  return insertUserIfAbsentQuery(db, input).executeTakeFirst();
}
