/**
 * backend/src/modules/orders/order.service.ts
 *
 * WHY:
 * - Owner-facing order operations: create, list, cancel.
 *
 * RULES:
 * - No raw DB access: everything goes through OrderRepo.
 * - Create validates its input before anything is stored or enqueued.
 * - Create hands the order to the progression queue after it is stored.
 *   The handoff is fire-and-forget: an enqueue failure is logged at error level
 *   and the stored order is still returned.
 * - Cancel is a compare-and-set on status = PENDING. Losing the race to the
 *   worker is INVALID_TRANSITION, never a silent overwrite.
 */

import { randomUUID } from 'node:crypto';

import { AppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { User } from '../users';

import { OrderErrors } from './order.errors';
import type { OrderRepo } from './order.repo';
import { orderInputSchema } from './order.schemas';
import type { Order, OrderStatus } from './order.types';
import { assertCanTransition, assertOrderExists } from './policies/order-transition.policy';

export type CreateOrderParams = {
  productName: string;
  amount: number;
  requestId: string;
};

export class OrderService {
  private readonly clock: () => Date;

  constructor(
    private readonly deps: {
      orderRepo: OrderRepo;
      queue: Queue;
      logger: Logger;
      clock?: () => Date;
    },
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async create(user: User, params: CreateOrderParams): Promise<Order> {
    const input = orderInputSchema.safeParse({
      productName: params.productName,
      amount: params.amount,
    });
    if (!input.success) {
      this.deps.logger.warn({
        msg: 'orders.create.rejected',
        flow: 'orders.create',
        requestId: params.requestId,
        userId: user.id,
      });
      throw AppError.invalidInput('body', input.error.issues);
    }

    const order = await this.deps.orderRepo.insertOrder({
      id: randomUUID(),
      userId: user.id,
      productName: input.data.productName,
      amount: input.data.amount,
      createdAt: this.clock(),
    });

    this.deps.logger.info({
      msg: 'orders.create.success',
      flow: 'orders.create',
      requestId: params.requestId,
      userId: user.id,
      orderId: order.id,
    });

    try {
      await this.deps.queue.enqueue({ type: 'orders.process-order', orderId: order.id });
    } catch (err: unknown) {
      this.deps.logger.error({
        msg: 'orders.create.enqueue_failed',
        flow: 'orders.create',
        requestId: params.requestId,
        orderId: order.id,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    return order;
  }

  async list(user: User, status?: OrderStatus): Promise<Order[]> {
    return this.deps.orderRepo.listByUser(user.id, status);
  }

  async cancel(user: User, orderId: string, requestId: string): Promise<Order> {
    const flow = 'orders.cancel';

    const order = await this.deps.orderRepo.findByIdForUser(orderId, user.id);
    assertOrderExists(order, orderId);
    assertCanTransition(order, 'CANCELLED', 'owner');

    const cancelled = await this.deps.orderRepo.transitionStatus({
      id: order.id,
      userId: user.id,
      from: 'PENDING',
      to: 'CANCELLED',
    });

    if (!cancelled) {
      // The worker moved it between our read and the conditional update.
      this.deps.logger.warn({
        msg: 'orders.cancel.lost_race',
        flow,
        requestId,
        userId: user.id,
        orderId,
      });
      throw OrderErrors.invalidTransition({ orderId });
    }

    this.deps.logger.info({
      msg: 'orders.cancel.success',
      flow,
      requestId,
      userId: user.id,
      orderId,
    });

    return cancelled;
  }
}
