/**
 * backend/src/modules/orders/order.routes.ts
 *
 * WHY:
 * - Declares Orders module endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { OrderController } from './order.controller';

export function registerOrderRoutes(app: FastifyInstance, controller: OrderController) {
  app.post('/orders/create', controller.create.bind(controller));
  app.get('/orders/my-orders', controller.listMine.bind(controller));
  app.post('/orders/:orderId/cancel', controller.cancel.bind(controller));
}
