/**
 * src/modules/auth/dal/kysely-refresh-token.repo.ts
 *
 * WHY:
 * - PostgreSQL-backed RefreshTokenRepo.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { RefreshTokenRecord } from '../auth.types';
import type { NewRefreshToken, RefreshTokenRepo } from '../refresh-token.repo';
import {
  deleteRefreshTokenByIdSql,
  deleteRefreshTokensForUserSql,
  selectRefreshTokenByTokenSql,
  upsertRefreshTokenSql,
  type RefreshTokenRow,
} from './refresh-token.query-sql';

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    token: row.token,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
  };
}

export class KyselyRefreshTokenRepo implements RefreshTokenRepo {
  constructor(private readonly db: DbExecutor) {}

  async replaceForUser(input: NewRefreshToken): Promise<RefreshTokenRecord> {
    return toRecord(await upsertRefreshTokenSql(this.db, input));
  }

  async findByToken(token: string): Promise<RefreshTokenRecord | undefined> {
    const row = await selectRefreshTokenByTokenSql(this.db, token);
    return row ? toRecord(row) : undefined;
  }

  async deleteById(id: string): Promise<void> {
    await deleteRefreshTokenByIdSql(this.db, id);
  }

  async deleteForUser(userId: string): Promise<number> {
    return deleteRefreshTokensForUserSql(this.db, userId);
  }
}
