/**
 * backend/src/modules/orders/dal/order.query-sql.ts
 *
 * WHY:
 * - Raw Kysely access for orders.
 *
 * RULES:
 * - No AppError.
 * - No policies (allowed transitions are decided by the service).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { OrdersTable } from '../../../shared/db/database.schema';
import type { StatusTransition } from '../order.repo';
import type { NewOrder, OrderStatus } from '../order.types';

export type OrderRow = Selectable<OrdersTable>;

export async function insertOrderSql(db: DbExecutor, input: NewOrder): Promise<OrderRow> {
  return db
    .insertInto('orders')
    .values({
      id: input.id,
      user_id: input.userId,
      product_name: input.productName,
      amount: input.amount,
      status: 'PENDING',
      created_at: input.createdAt,
    })
    .returningAll()
    .executeTakeFirstOrThrow();
}

export async function selectOrdersByUserSql(
  db: DbExecutor,
  userId: string,
  status?: OrderStatus,
): Promise<OrderRow[]> {
  let query = db.selectFrom('orders').selectAll().where('user_id', '=', userId);

  if (status) {
    query = query.where('status', '=', status);
  }

  return query.orderBy('created_at', 'asc').orderBy('id', 'asc').execute();
}

export async function selectOrderByIdSql(
  db: DbExecutor,
  id: string,
): Promise<OrderRow | undefined> {
  return db.selectFrom('orders').selectAll().where('id', '=', id).executeTakeFirst();
}

export async function selectOrderByIdForUserSql(
  db: DbExecutor,
  id: string,
  userId: string,
): Promise<OrderRow | undefined> {
  return db
    .selectFrom('orders')
    .selectAll()
    .where('id', '=', id)
    .where('user_id', '=', userId)
    .executeTakeFirst();
}

/**
 * UPDATE orders SET status = :to WHERE id = :id [AND user_id = :userId] AND status = :from RETURNING *
 * Zero rows back means another writer moved the order first.
 */
export function transitionOrderStatusQuery(db: DbExecutor, input: StatusTransition) {
  let query = db.updateTable('orders').set({ status: input.to }).where('id', '=', input.id);

  if (input.userId !== undefined) {
    query = query.where('user_id', '=', input.userId);
  }

  return query.where('status', '=', input.from).returningAll();
}

export async function transitionOrderStatusSql(
  db: DbExecutor,
  input: StatusTransition,
): Promise<OrderRow | undefined> {
  return transitionOrderStatusQuery(db, input).executeTakeFirst();
}
