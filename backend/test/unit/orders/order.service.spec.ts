import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemOrderRepo } from '../../../src/modules/orders';
import { OrderService } from '../../../src/modules/orders/order.service';
import type { User } from '../../../src/modules/users';
import { AppError } from '../../../src/shared/http/errors';
import { logger } from '../../../src/shared/logger/logger';
import { InMemQueue } from '../../../src/shared/messaging/inmem-queue';

const T0 = new Date('2030-01-01T00:00:00.000Z');

function makeUser(id: string): User {
  return { id, email: `${id}@example.com`, name: id, createdAt: T0, updatedAt: T0 };
}

describe('OrderService', () => {
  const ada = makeUser('ada');
  const bob = makeUser('bob');

  let orderRepo: InMemOrderRepo;
  let queue: InMemQueue;
  let service: OrderService;

  beforeEach(() => {
    orderRepo = new InMemOrderRepo();
    queue = new InMemQueue();
    service = new OrderService({ orderRepo, queue, logger, clock: () => T0 });
  });

  describe('create', () => {
    it('stores a PENDING order and enqueues one progression message', async () => {
      const order = await service.create(ada, {
        productName: 'Desk',
        amount: 120.25,
        requestId: 'req-test-0001',
      });

      expect(order).toMatchObject({
        userId: 'ada',
        productName: 'Desk',
        amount: 120.25,
        status: 'PENDING',
        createdAt: T0,
      });
      expect(queue.drain()).toEqual([{ type: 'orders.process-order', orderId: order.id }]);
    });

    it('logs and swallows an enqueue failure', async () => {
      const errorLog = vi.spyOn(logger, 'error');
      queue.failWith(new Error('queue unavailable'));

      const order = await service.create(ada, {
        productName: 'Desk',
        amount: 1,
        requestId: 'req-test-0001',
      });

      expect(await orderRepo.findById(order.id)).toEqual(order);
      expect(errorLog).toHaveBeenCalledWith(
        expect.objectContaining({
          msg: 'orders.create.enqueue_failed',
          orderId: order.id,
          message: 'queue unavailable',
        }),
      );
    });
  });

  describe('create validation', () => {
    it.each([
      ['an empty product name', { productName: '', amount: 10 }],
      ['a zero amount', { productName: 'Desk', amount: 0 }],
      ['a negative amount', { productName: 'Desk', amount: -1 }],
      ['a NaN amount', { productName: 'Desk', amount: Number.NaN }],
      ['an infinite amount', { productName: 'Desk', amount: Number.POSITIVE_INFINITY }],
    ])('rejects %s without storing or enqueueing', async (_label, input) => {
      const attempt = service.create(ada, { ...input, requestId: 'req-test-0001' });

      await expect(attempt).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        status: 422,
        message: 'Invalid request body.',
      });
      expect(await orderRepo.listByUser('ada')).toEqual([]);
      expect(queue.drain()).toEqual([]);
    });
  });

  describe('list', () => {
    it('returns only the caller orders, optionally filtered by status', async () => {
      const a1 = await service.create(ada, { productName: 'A1', amount: 1, requestId: 'r' });
      await service.create(bob, { productName: 'B1', amount: 1, requestId: 'r' });
      const a2 = await service.create(ada, { productName: 'A2', amount: 2, requestId: 'r' });
      await service.cancel(ada, a2.id, 'r');

      expect((await service.list(ada)).map((o) => o.id)).toEqual([a1.id, a2.id]);
      expect((await service.list(ada, 'CANCELLED')).map((o) => o.id)).toEqual([a2.id]);
      expect(await service.list(ada, 'COMPLETED')).toEqual([]);
    });
  });

  describe('cancel', () => {
    it('moves a PENDING order to CANCELLED', async () => {
      const order = await service.create(ada, { productName: 'Desk', amount: 1, requestId: 'r' });

      const cancelled = await service.cancel(ada, order.id, 'r');

      expect(cancelled.status).toBe('CANCELLED');
      expect((await orderRepo.findById(order.id))?.status).toBe('CANCELLED');
    });

    it('answers NOT_FOUND for a missing order and for a foreign order alike', async () => {
      const bobs = await service.create(bob, { productName: 'Chair', amount: 1, requestId: 'r' });

      await expect(service.cancel(ada, 'missing', 'r')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        status: 404,
        message: 'Order not found.',
      });
      await expect(service.cancel(ada, bobs.id, 'r')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        status: 404,
        message: 'Order not found.',
      });
    });

    it('answers INVALID_TRANSITION once the worker has started the order', async () => {
      const order = await service.create(ada, { productName: 'Desk', amount: 1, requestId: 'r' });
      await orderRepo.transitionStatus({ id: order.id, from: 'PENDING', to: 'PROCESSING' });

      await expect(service.cancel(ada, order.id, 'r')).rejects.toMatchObject({
        code: 'INVALID_TRANSITION',
        status: 400,
      });
    });

    it('answers INVALID_TRANSITION when the worker wins between read and write', async () => {
      const order = await service.create(ada, { productName: 'Desk', amount: 1, requestId: 'r' });

      // The read still sees PENDING, but the conditional update finds PROCESSING.
      const original = orderRepo.findByIdForUser.bind(orderRepo);
      vi.spyOn(orderRepo, 'findByIdForUser').mockImplementationOnce(async (id, userId) => {
        const snapshot = await original(id, userId);
        await orderRepo.transitionStatus({ id, from: 'PENDING', to: 'PROCESSING' });
        return snapshot;
      });

      const attempt = service.cancel(ada, order.id, 'r');
      await expect(attempt).rejects.toBeInstanceOf(AppError);
      await expect(attempt).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });

      expect((await orderRepo.findById(order.id))?.status).toBe('PROCESSING');
    });
  });
});
