/**
 * backend/src/modules/users/dal/kysely-user.repo.ts
 *
 * WHY:
 * - PostgreSQL-backed UserRepo.
 * - Shapes DB rows (snake_case) into User domain types.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRepo } from '../user.repo';
import type { NewUser, User, UserCredentials } from '../user.types';
import {
  insertUserIfAbsentSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  type UserRow,
} from './user.query-sql';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyUserRepo implements UserRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, id);
    return row ? toUser(row) : undefined;
  }

  async findCredentialsByEmail(email: string): Promise<UserCredentials | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    if (!row) return undefined;
    return { user: toUser(row), passwordHash: row.password_hash };
  }

  async insertUser(input: NewUser): Promise<User | null> {
    const row = await insertUserIfAbsentSql(this.db, input);
    return row ? toUser(row) : null;
  }
}
