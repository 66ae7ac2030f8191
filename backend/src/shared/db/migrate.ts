/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Bring the database schema up to date before the API or worker starts.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @orderdesk/backend
 */

import { Migrator } from 'kysely';
import type { MigrationProvider } from 'kysely';

import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';
import { createDb } from './db';
import { migrations } from './migrations';

const provider: MigrationProvider = {
  getMigrations: async () => migrations,
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('db.migrate.start', { count: Object.keys(migrations).length });

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', {
      message: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }

  logger.info('db.migrate.done');
}

void runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.crashed', {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
