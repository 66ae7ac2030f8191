/**
 * src/modules/auth/index.ts
 *
 * Public surface of the auth module.
 */

export { createAuthModule, type AuthModule } from './auth.module';
export type { AuthGate } from './auth-gate';
export type { RefreshTokenRepo } from './refresh-token.repo';
export { KyselyRefreshTokenRepo } from './dal/kysely-refresh-token.repo';
export { InMemRefreshTokenRepo } from './dal/inmem-refresh-token.repo';
