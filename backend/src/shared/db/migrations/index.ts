/**
 * src/shared/db/migrations/index.ts
 *
 * Ordered migration list for the Migrator. Add new files here.
 * Static imports keep this working both under tsx and from dist/.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_refresh_tokens';
import * as m0003 from './0003_orders';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_refresh_tokens': m0002,
  '0003_orders': m0003,
};
