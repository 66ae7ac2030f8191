/**
 * backend/src/modules/orders/dal/inmem-order.repo.ts
 *
 * WHY:
 * - Test/dev OrderRepo with the same compare-and-set semantics as the SQL update.
 */

import type { OrderRepo, StatusTransition } from '../order.repo';
import type { NewOrder, Order, OrderStatus } from '../order.types';

export class InMemOrderRepo implements OrderRepo {
  // Map keeps insertion order, which is the listing order.
  private readonly orders = new Map<string, Order>();

  async insertOrder(input: NewOrder): Promise<Order> {
    const order: Order = { ...input, status: 'PENDING' };
    this.orders.set(order.id, order);
    return { ...order };
  }

  async listByUser(userId: string, status?: OrderStatus): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((o) => o.userId === userId && (status === undefined || o.status === status))
      .map((o) => ({ ...o }));
  }

  async findById(id: string): Promise<Order | undefined> {
    const order = this.orders.get(id);
    return order ? { ...order } : undefined;
  }

  async findByIdForUser(id: string, userId: string): Promise<Order | undefined> {
    const order = this.orders.get(id);
    return order && order.userId === userId ? { ...order } : undefined;
  }

  async transitionStatus(input: StatusTransition): Promise<Order | undefined> {
    const order = this.orders.get(input.id);
    if (!order) return undefined;
    if (input.userId !== undefined && order.userId !== input.userId) return undefined;
    if (order.status !== input.from) return undefined;

    order.status = input.to;
    return { ...order };
  }
}
