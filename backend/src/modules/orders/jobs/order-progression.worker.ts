/**
 * backend/src/modules/orders/jobs/order-progression.worker.ts
 *
 * WHY:
 * - Moves a newly created order PENDING → PROCESSING → COMPLETED in the background.
 *
 * RULES:
 * - Delivery is at-least-once, so handle() must be safe to repeat:
 *   - PENDING: run both steps.
 *   - PROCESSING (redelivery after a crash): resume at the second step.
 *   - COMPLETED / CANCELLED / missing: logged no-op.
 * - Every step is a compare-and-set; a cancel that lands between the read and
 *   the write wins and the step becomes a no-op.
 * - Store faults propagate to the queue consumer (which retries the message).
 */

import type { Logger } from '../../../shared/logger/logger';
import type { QueueMessage } from '../../../shared/messaging/queue';
import type { OrderRepo } from '../order.repo';
import type { OrderStatus } from '../order.types';
import { isTerminal } from '../policies/order-transition.policy';

export type ProgressionOutcome = 'completed' | 'skipped' | 'missing';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class OrderProgressionWorker {
  private readonly sleep: Sleep;

  constructor(
    private readonly deps: {
      orderRepo: OrderRepo;
      logger: Logger;
      stepDelayMs: number;
      sleep?: Sleep;
    },
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async handle(message: QueueMessage): Promise<ProgressionOutcome> {
    const { orderId } = message;
    const flow = 'orders.progression';

    const order = await this.deps.orderRepo.findById(orderId);
    if (!order) {
      this.deps.logger.warn({ msg: 'orders.progression.missing', flow, orderId });
      return 'missing';
    }

    if (isTerminal(order.status)) {
      this.deps.logger.info({
        msg: 'orders.progression.skipped',
        flow,
        orderId,
        status: order.status,
      });
      return 'skipped';
    }

    if (order.status === 'PENDING') {
      const moved = await this.step(orderId, 'PENDING', 'PROCESSING');
      if (!moved) return 'skipped';

      await this.sleep(this.deps.stepDelayMs);
    }

    const completed = await this.step(orderId, 'PROCESSING', 'COMPLETED');
    return completed ? 'completed' : 'skipped';
  }

  private async step(orderId: string, from: OrderStatus, to: OrderStatus): Promise<boolean> {
    const updated = await this.deps.orderRepo.transitionStatus({ id: orderId, from, to });

    if (!updated) {
      this.deps.logger.info({
        msg: 'orders.progression.step_skipped',
        flow: 'orders.progression',
        orderId,
        from,
        to,
      });
      return false;
    }

    this.deps.logger.info({
      msg: 'orders.progression.step',
      flow: 'orders.progression',
      orderId,
      from,
      to,
    });
    return true;
  }
}
