/**
 * backend/src/modules/orders/order.errors.ts
 *
 * WHY:
 * - Orders module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - A missing order and someone else's order are the same NOT_FOUND
 *   (no probing for other users' order ids).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const OrderErrors = {
  notFound(meta?: AppErrorMeta) {
    return new AppError('NOT_FOUND', 'Order not found.', meta);
  },

  invalidTransition(meta?: AppErrorMeta) {
    return new AppError(
      'INVALID_TRANSITION',
      'Order cannot be cancelled in its current status.',
      meta,
    );
  },
} as const;
