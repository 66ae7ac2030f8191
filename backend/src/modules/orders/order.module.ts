/**
 * backend/src/modules/orders/order.module.ts
 *
 * WHY:
 * - Encapsulates Orders module wiring (service + HTTP + background worker).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { BearerAuthenticator } from '../../shared/http/require-auth-user';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';

import { OrderProgressionWorker, type Sleep } from './jobs/order-progression.worker';
import { OrderController } from './order.controller';
import type { OrderRepo } from './order.repo';
import { registerOrderRoutes } from './order.routes';
import { OrderService } from './order.service';

export type OrderModule = ReturnType<typeof createOrderModule>;

export function createOrderModule(deps: {
  orderRepo: OrderRepo;
  queue: Queue;
  logger: Logger;
  authenticator: BearerAuthenticator;
  progressionStepMs: number;
  sleep?: Sleep;
  clock?: () => Date;
}) {
  const orderService = new OrderService({
    orderRepo: deps.orderRepo,
    queue: deps.queue,
    logger: deps.logger,
    clock: deps.clock,
  });

  const progressionWorker = new OrderProgressionWorker({
    orderRepo: deps.orderRepo,
    logger: deps.logger,
    stepDelayMs: deps.progressionStepMs,
    sleep: deps.sleep,
  });

  const controller = new OrderController(orderService, deps.authenticator);

  return {
    orderService,
    progressionWorker,
    registerRoutes(app: FastifyInstance) {
      registerOrderRoutes(app, controller);
    },
  };
}
