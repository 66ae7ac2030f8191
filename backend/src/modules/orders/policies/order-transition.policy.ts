/**
 * backend/src/modules/orders/policies/order-transition.policy.ts
 *
 * WHY:
 * - The order state machine in one table.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Anything not listed in ALLOWED_TRANSITIONS is invalid.
 * - COMPLETED and CANCELLED are terminal.
 */

import { OrderErrors } from '../order.errors';
import type { Order, OrderStatus } from '../order.types';

export type TransitionActor = 'owner' | 'worker';

type AllowedTransition = Readonly<{ from: OrderStatus; to: OrderStatus; actor: TransitionActor }>;

export const ALLOWED_TRANSITIONS: readonly AllowedTransition[] = [
  { from: 'PENDING', to: 'PROCESSING', actor: 'worker' },
  { from: 'PROCESSING', to: 'COMPLETED', actor: 'worker' },
  { from: 'PENDING', to: 'CANCELLED', actor: 'owner' },
];

export function isTransitionAllowed(
  from: OrderStatus,
  to: OrderStatus,
  actor: TransitionActor,
): boolean {
  return ALLOWED_TRANSITIONS.some((t) => t.from === from && t.to === to && t.actor === actor);
}

export function isTerminal(status: OrderStatus): boolean {
  return !ALLOWED_TRANSITIONS.some((t) => t.from === status);
}

export function assertOrderExists(order: Order | undefined, orderId: string): asserts order is Order {
  if (!order) throw OrderErrors.notFound({ orderId });
}

export function assertCanTransition(order: Order, to: OrderStatus, actor: TransitionActor): void {
  if (!isTransitionAllowed(order.status, to, actor)) {
    throw OrderErrors.invalidTransition({ orderId: order.id, from: order.status, to });
  }
}
