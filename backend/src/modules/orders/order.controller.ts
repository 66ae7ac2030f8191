/**
 * backend/src/modules/orders/order.controller.ts
 *
 * WHY:
 * - Maps HTTP → OrderService for the owner-facing order endpoints.
 * - Every endpoint is behind the bearer-token gate.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireAuthUser, type BearerAuthenticator } from '../../shared/http/require-auth-user';
import { createOrderSchema, listOrdersQuerySchema, orderIdParamsSchema } from './order.schemas';
import type { OrderService } from './order.service';
import type { Order, OrderResponse } from './order.types';

export function toOrderResponse(order: Order): OrderResponse {
  return {
    id: order.id,
    user_id: order.userId,
    product_name: order.productName,
    amount: order.amount,
    status: order.status,
    created_at: order.createdAt.toISOString(),
  };
}

export class OrderController {
  constructor(
    private readonly orderService: OrderService,
    private readonly authenticator: BearerAuthenticator,
  ) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const user = await requireAuthUser(req, this.authenticator);

    const parsed = createOrderSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('body', parsed.error.issues);
    }

    const order = await this.orderService.create(user, {
      productName: parsed.data.product_name,
      amount: parsed.data.amount,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(toOrderResponse(order));
  }

  async listMine(req: FastifyRequest, reply: FastifyReply) {
    const user = await requireAuthUser(req, this.authenticator);

    const parsed = listOrdersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.invalidInput('query', parsed.error.issues);
    }

    const orders = await this.orderService.list(user, parsed.data.status);
    return reply.status(200).send(orders.map(toOrderResponse));
  }

  async cancel(req: FastifyRequest, reply: FastifyReply) {
    const user = await requireAuthUser(req, this.authenticator);

    const parsed = orderIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.invalidInput('params', parsed.error.issues);
    }

    const order = await this.orderService.cancel(
      user,
      parsed.data.orderId,
      req.requestContext.requestId,
    );
    return reply.status(200).send(toOrderResponse(order));
  }
}
