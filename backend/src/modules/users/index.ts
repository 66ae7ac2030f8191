/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal.
 *
 * RULES:
 * - Keep exports minimal; add more only when explicitly required.
 */

export type { User, UserCredentials, NewUser } from './user.types';
export type { UserRepo } from './user.repo';
export { KyselyUserRepo } from './dal/kysely-user.repo';
export { InMemUserRepo } from './dal/inmem-user.repo';
