/**
 * src/modules/auth/dal/refresh-token.query-sql.ts
 *
 * WHY:
 * - Raw Kysely access for refresh_tokens.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Query builders are exported separately so their SQL can be asserted
 *   without a database.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { RefreshTokensTable } from '../../../shared/db/database.schema';
import type { NewRefreshToken } from '../refresh-token.repo';

export type RefreshTokenRow = Selectable<RefreshTokensTable>;

/**
 * INSERT ... ON CONFLICT (user_id) DO UPDATE SET <every column from excluded>
 * Replaces the user's token in one statement.
 */
export function upsertRefreshTokenQuery(db: DbExecutor, input: NewRefreshToken) {
  return db
    .insertInto('refresh_tokens')
    .values({
      id: input.id,
      user_id: input.userId,
      token: input.token,
      expires_at: input.expiresAt,
      created_at: input.createdAt,
    })
    .onConflict((oc) =>
      oc.column('user_id').doUpdateSet((eb) => ({
        id: eb.ref('excluded.id'),
        token: eb.ref('excluded.token'),
        expires_at: eb.ref('excluded.expires_at'),
        created_at: eb.ref('excluded.created_at'),
      })),
    )
    .returningAll();
}

export async function upsertRefreshTokenSql(
  db: DbExecutor,
  input: NewRefreshToken,
): Promise<RefreshTokenRow> {
  return upsertRefreshTokenQuery(db, input).executeTakeFirstOrThrow();
}

export async function selectRefreshTokenByTokenSql(
  db: DbExecutor,
  token: string,
): Promise<RefreshTokenRow | undefined> {
  return db.selectFrom('refresh_tokens').selectAll().where('token', '=', token).executeTakeFirst();
}

export async function deleteRefreshTokenByIdSql(db: DbExecutor, id: string): Promise<void> {
  await db.deleteFrom('refresh_tokens').where('id', '=', id).execute();
}

export async function deleteRefreshTokensForUserSql(
  db: DbExecutor,
  userId: string,
): Promise<number> {
  const result = await db
    .deleteFrom('refresh_tokens')
    .where('user_id', '=', userId)
    .executeTakeFirst();
  return Number(result.numDeletedRows);
}
