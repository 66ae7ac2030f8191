/**
 * src/shared/db/migrations/0003_orders.ts
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('orders')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('user_id', 'text', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('product_name', 'text', (col) => col.notNull())
    .addColumn('amount', 'double precision', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('PENDING'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE orders
      ADD CONSTRAINT orders_status_check
      CHECK (status IN ('PENDING','PROCESSING','COMPLETED','CANCELLED'));
  `.execute(db);

  await sql`
    ALTER TABLE orders
      ADD CONSTRAINT orders_amount_positive_check
      CHECK (amount > 0);
  `.execute(db);

  // "my orders" filtered by status
  await db.schema
    .createIndex('orders_user_id_status_idx')
    .on('orders')
    .columns(['user_id', 'status'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('orders').ifExists().execute();
}
