import { describe, it, expect } from 'vitest';
import { KyselyRefreshTokenRepo } from '../../src/modules/auth/dal/kysely-refresh-token.repo';
import { KyselyOrderRepo } from '../../src/modules/orders/dal/kysely-order.repo';
import { KyselyUserRepo } from '../../src/modules/users/dal/kysely-user.repo';
import { createCompileOnlyDb } from '../helpers/compile-only-db';

// DummyDriver answers every query with zero rows.
describe('Kysely repos over an empty database', () => {
  const db = createCompileOnlyDb();

  it('user lookups miss', async () => {
    const repo = new KyselyUserRepo(db);

    expect(await repo.findById('user-1')).toBeUndefined();
    expect(await repo.findCredentialsByEmail('ada@example.com')).toBeUndefined();
  });

  it('refresh token lookup misses', async () => {
    const repo = new KyselyRefreshTokenRepo(db);

    expect(await repo.findByToken('test-refresh-token')).toBeUndefined();
  });

  it('order reads return nothing', async () => {
    const repo = new KyselyOrderRepo(db);

    expect(await repo.listByUser('user-1')).toEqual([]);
    expect(await repo.listByUser('user-1', 'PENDING')).toEqual([]);
    expect(await repo.findById('order-1')).toBeUndefined();
    expect(await repo.findByIdForUser('order-1', 'user-1')).toBeUndefined();
    expect(await repo.transitionStatus({ id: 'order-1', from: 'PENDING', to: 'PROCESSING' })).toBeUndefined();
  });

  it('exposes only the repository contract', () => {
    const methods = (proto: object) =>
      Object.getOwnPropertyNames(proto)
        .filter((name) => name !== 'constructor')
        .sort();

    expect(methods(KyselyUserRepo.prototype)).toEqual([
      'findById',
      'findCredentialsByEmail',
      'insertUser',
    ]);
    expect(methods(KyselyRefreshTokenRepo.prototype)).toEqual([
      'deleteById',
      'deleteForUser',
      'findByToken',
      'replaceForUser',
    ]);
    expect(methods(KyselyOrderRepo.prototype)).toEqual([
      'findById',
      'findByIdForUser',
      'insertOrder',
      'listByUser',
      'transitionStatus',
    ]);
  });
});
