/**
 * backend/src/modules/users/dal/inmem-user.repo.ts
 *
 * WHY:
 * - Test/dev UserRepo with the same contract as the PostgreSQL one
 *   (unique email, insert-if-absent).
 */

import type { UserRepo } from '../user.repo';
import type { NewUser, User, UserCredentials } from '../user.types';

type StoredUser = { user: User; passwordHash: string };

export class InMemUserRepo implements UserRepo {
  private readonly byId = new Map<string, StoredUser>();
  private readonly idByEmail = new Map<string, string>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findById(id: string): Promise<User | undefined> {
    return this.byId.get(id)?.user;
  }

  async findCredentialsByEmail(email: string): Promise<UserCredentials | undefined> {
    const id = this.idByEmail.get(email);
    if (id === undefined) return undefined;

    const stored = this.byId.get(id);
    return stored ? { user: stored.user, passwordHash: stored.passwordHash } : undefined;
  }

  async insertUser(input: NewUser): Promise<User | null> {
    if (this.idByEmail.has(input.email)) return null;

    const at = this.now();
    const user: User = {
      id: input.id,
      email: input.email,
      name: input.name,
      createdAt: at,
      updatedAt: at,
    };

    this.byId.set(user.id, { user, passwordHash: input.passwordHash });
    this.idByEmail.set(user.email, user.id);
    return user;
  }

  /** Test hook: simulates an account removed after tokens were issued. */
  delete(id: string): void {
    const stored = this.byId.get(id);
    if (!stored) return;
    this.byId.delete(id);
    this.idByEmail.delete(stored.user.email);
  }
}
