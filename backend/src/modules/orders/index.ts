/**
 * backend/src/modules/orders/index.ts
 *
 * Public surface of the orders module.
 */

export { createOrderModule, type OrderModule } from './order.module';
export type { OrderRepo } from './order.repo';
export type { Order, OrderStatus } from './order.types';
export { KyselyOrderRepo } from './dal/kysely-order.repo';
export { InMemOrderRepo } from './dal/inmem-order.repo';
export type { Sleep, ProgressionOutcome } from './jobs/order-progression.worker';
