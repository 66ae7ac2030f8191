/**
 * backend/src/modules/orders/order.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Orders module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - amount must be a finite number > 0 (NaN / Infinity never reach the service).
 * - orderInputSchema is the same rule on the service's own field names. The
 *   service re-checks with it, so callers other than the controller (worker,
 *   scripts) cannot store an invalid order.
 */

import { z } from 'zod';
import { ORDER_STATUSES } from './order.types';

const productName = z.string().min(1, 'Product name is required');
const amount = z.number().finite().positive('Amount must be greater than 0');

export const createOrderSchema = z.object({
  product_name: productName,
  amount,
});

export const orderInputSchema = z.object({ productName, amount });

export type CreateOrderInput = z.infer<typeof createOrderSchema>;

export const listOrdersQuerySchema = z.object({
  status: z.enum(ORDER_STATUSES).optional(),
});

export type ListOrdersQuery = z.infer<typeof listOrdersQuerySchema>;

export const orderIdParamsSchema = z.object({
  orderId: z.string().min(1),
});
