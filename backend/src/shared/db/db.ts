/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in database.schema.ts and are kept in step with the
 *   migrations by hand (three tables; no codegen step).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import { logger } from '../logger/logger';
import type { DB } from './database.schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Modules receive it from the composition root and never build their own.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
    // Failed statements only; parameters stay out of the log (they can hold tokens).
    log(event) {
      if (event.level !== 'error') return;
      logger.error('db.query_failed', {
        flow: 'db',
        sql: event.query.sql,
        durationMs: event.queryDurationMillis,
        message: event.error instanceof Error ? event.error.message : String(event.error),
      });
    },
  });
}
