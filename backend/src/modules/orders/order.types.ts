/**
 * backend/src/modules/orders/order.types.ts
 *
 * WHY:
 * - Domain types for the Orders module.
 *
 * RULES:
 * - Keep aligned with DB schema (status CHECK constraint).
 * - Avoid leaking DB naming (snake_case) outside DAL and the wire shape.
 */

export const ORDER_STATUSES = ['PENDING', 'PROCESSING', 'COMPLETED', 'CANCELLED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export type Order = {
  id: string;
  userId: string;
  productName: string;
  amount: number;
  status: OrderStatus;
  createdAt: Date;
};

export type NewOrder = {
  id: string;
  userId: string;
  productName: string;
  amount: number;
  createdAt: Date;
};

/** Wire shape for every order endpoint. */
export type OrderResponse = {
  id: string;
  user_id: string;
  product_name: string;
  amount: number;
  status: OrderStatus;
  created_at: string;
};
