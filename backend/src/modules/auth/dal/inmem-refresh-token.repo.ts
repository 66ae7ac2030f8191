/**
 * src/modules/auth/dal/inmem-refresh-token.repo.ts
 *
 * WHY:
 * - Test/dev RefreshTokenRepo. Keyed by userId, so replacement has the same
 *   one-row-per-user outcome as the PostgreSQL upsert.
 * - Reads return copies, like rows fetched from a database.
 */

import type { RefreshTokenRecord } from '../auth.types';
import type { NewRefreshToken, RefreshTokenRepo } from '../refresh-token.repo';

export class InMemRefreshTokenRepo implements RefreshTokenRepo {
  private readonly byUserId = new Map<string, RefreshTokenRecord>();

  async replaceForUser(input: NewRefreshToken): Promise<RefreshTokenRecord> {
    this.byUserId.set(input.userId, { ...input });
    return { ...input };
  }

  async findByToken(token: string): Promise<RefreshTokenRecord | undefined> {
    for (const record of this.byUserId.values()) {
      if (record.token === token) return { ...record };
    }
    return undefined;
  }

  async deleteById(id: string): Promise<void> {
    for (const [userId, record] of this.byUserId) {
      if (record.id === id) this.byUserId.delete(userId);
    }
  }

  async deleteForUser(userId: string): Promise<number> {
    return this.byUserId.delete(userId) ? 1 : 0;
  }

  /** Test hook: rows currently stored. */
  count(): number {
    return this.byUserId.size;
  }

  /** Test hook: overwrite a stored row (e.g. force an expiry in the past). */
  put(record: RefreshTokenRecord): void {
    this.byUserId.set(record.userId, { ...record });
  }

  findForUser(userId: string): RefreshTokenRecord | undefined {
    const record = this.byUserId.get(userId);
    return record ? { ...record } : undefined;
  }
}
