/**
 * backend/src/modules/orders/order.repo.ts
 *
 * WHY:
 * - The one contract the order service and progression worker use for orders.
 *
 * RULES:
 * - No AppError.
 * - Status changes go through transitionStatus only: a compare-and-set on the
 *   current status, so a cancel and a worker step can never overwrite each other.
 */

import type { NewOrder, Order, OrderStatus } from './order.types';

export type StatusTransition = {
  id: string;
  from: OrderStatus;
  to: OrderStatus;
  /** When set, the row must also belong to this user. */
  userId?: string;
};

export interface OrderRepo {
  insertOrder(input: NewOrder): Promise<Order>;

  /** Caller's orders in insertion order (created_at, then id). */
  listByUser(userId: string, status?: OrderStatus): Promise<Order[]>;

  findById(id: string): Promise<Order | undefined>;
  findByIdForUser(id: string, userId: string): Promise<Order | undefined>;

  /** Returns the updated order, or undefined when the row was not in `from` (or not found). */
  transitionStatus(input: StatusTransition): Promise<Order | undefined>;
}
