import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemOrderRepo } from '../../../src/modules/orders';
import { OrderProgressionWorker } from '../../../src/modules/orders/jobs/order-progression.worker';
import type { OrderStatus } from '../../../src/modules/orders/order.types';
import { logger } from '../../../src/shared/logger/logger';

const T0 = new Date('2030-01-01T00:00:00.000Z');

describe('OrderProgressionWorker', () => {
  let orderRepo: InMemOrderRepo;
  let sleeps: number[];
  let worker: OrderProgressionWorker;

  beforeEach(() => {
    orderRepo = new InMemOrderRepo();
    sleeps = [];
    worker = new OrderProgressionWorker({
      orderRepo,
      logger,
      stepDelayMs: 5000,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  });

  async function seed(status: OrderStatus = 'PENDING') {
    const order = await orderRepo.insertOrder({
      id: 'order-1',
      userId: 'user-1',
      productName: 'Desk',
      amount: 10,
      createdAt: T0,
    });
    if (status === 'PROCESSING' || status === 'COMPLETED') {
      await orderRepo.transitionStatus({ id: order.id, from: 'PENDING', to: 'PROCESSING' });
    }
    if (status === 'COMPLETED') {
      await orderRepo.transitionStatus({ id: order.id, from: 'PROCESSING', to: 'COMPLETED' });
    }
    if (status === 'CANCELLED') {
      await orderRepo.transitionStatus({ id: order.id, from: 'PENDING', to: 'CANCELLED' });
    }
    return order;
  }

  const message = { type: 'orders.process-order' as const, orderId: 'order-1' };

  it('moves PENDING through PROCESSING to COMPLETED with one step delay', async () => {
    await seed();
    const transition = vi.spyOn(orderRepo, 'transitionStatus');

    await expect(worker.handle(message)).resolves.toBe('completed');

    expect(transition.mock.calls).toEqual([
      [{ id: 'order-1', from: 'PENDING', to: 'PROCESSING' }],
      [{ id: 'order-1', from: 'PROCESSING', to: 'COMPLETED' }],
    ]);
    expect(sleeps).toEqual([5000]);
    expect((await orderRepo.findById('order-1'))?.status).toBe('COMPLETED');
  });

  it('resumes a redelivered PROCESSING order at the second step without waiting', async () => {
    await seed('PROCESSING');

    await expect(worker.handle(message)).resolves.toBe('completed');

    expect(sleeps).toEqual([]);
    expect((await orderRepo.findById('order-1'))?.status).toBe('COMPLETED');
  });

  it.each<OrderStatus>(['COMPLETED', 'CANCELLED'])('is a no-op for a %s order', async (status) => {
    await seed(status);
    const transition = vi.spyOn(orderRepo, 'transitionStatus');

    await expect(worker.handle(message)).resolves.toBe('skipped');

    expect(transition).not.toHaveBeenCalled();
    expect((await orderRepo.findById('order-1'))?.status).toBe(status);
  });

  it('is a no-op for a missing order', async () => {
    await expect(worker.handle(message)).resolves.toBe('missing');
  });

  it('stops when the order is cancelled during the step delay', async () => {
    await seed();
    worker = new OrderProgressionWorker({
      orderRepo,
      logger,
      stepDelayMs: 5000,
      // While the worker waits, the PROCESSING order is force-moved; the
      // second compare-and-set must then miss.
      sleep: async () => {
        await orderRepo.transitionStatus({ id: 'order-1', from: 'PROCESSING', to: 'COMPLETED' });
      },
    });

    await expect(worker.handle(message)).resolves.toBe('skipped');
  });

  it('stops when a cancel lands between the read and the first step', async () => {
    await seed();
    const original = orderRepo.findById.bind(orderRepo);
    vi.spyOn(orderRepo, 'findById').mockImplementationOnce(async (id) => {
      const snapshot = await original(id);
      await orderRepo.transitionStatus({ id, from: 'PENDING', to: 'CANCELLED' });
      return snapshot;
    });

    await expect(worker.handle(message)).resolves.toBe('skipped');
    expect((await orderRepo.findById('order-1'))?.status).toBe('CANCELLED');
    expect(sleeps).toEqual([]);
  });

  it('propagates store faults so the consumer can retry', async () => {
    await seed();
    const fault = new Error('connection reset');
    vi.spyOn(orderRepo, 'findById').mockRejectedValueOnce(fault);

    await expect(worker.handle(message)).rejects.toBe(fault);
  });
});
