/**
 * backend/src/modules/orders/dal/kysely-order.repo.ts
 *
 * WHY:
 * - PostgreSQL-backed OrderRepo.
 * - Shapes DB rows into Order domain types.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { OrderRepo, StatusTransition } from '../order.repo';
import type { NewOrder, Order, OrderStatus } from '../order.types';
import {
  insertOrderSql,
  selectOrderByIdForUserSql,
  selectOrderByIdSql,
  selectOrdersByUserSql,
  transitionOrderStatusSql,
  type OrderRow,
} from './order.query-sql';

function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    userId: row.user_id,
    productName: row.product_name,
    // pg returns double precision as number; coerce in case a driver hands back a string.
    amount: Number(row.amount),
    status: row.status,
    createdAt: row.created_at,
  };
}

export class KyselyOrderRepo implements OrderRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertOrder(input: NewOrder): Promise<Order> {
    return toOrder(await insertOrderSql(this.db, input));
  }

  async listByUser(userId: string, status?: OrderStatus): Promise<Order[]> {
    const rows = await selectOrdersByUserSql(this.db, userId, status);
    return rows.map(toOrder);
  }

  async findById(id: string): Promise<Order | undefined> {
    const row = await selectOrderByIdSql(this.db, id);
    return row ? toOrder(row) : undefined;
  }

  async findByIdForUser(id: string, userId: string): Promise<Order | undefined> {
    const row = await selectOrderByIdForUserSql(this.db, id, userId);
    return row ? toOrder(row) : undefined;
  }

  async transitionStatus(input: StatusTransition): Promise<Order | undefined> {
    const row = await transitionOrderStatusSql(this.db, input);
    return row ? toOrder(row) : undefined;
  }
}
