import { describe, it, expect } from 'vitest';
import { InMemQueue } from '../../../../src/shared/messaging/inmem-queue';
import {
  encodeQueueDelivery,
  parseQueueDelivery,
  parseQueueMessage,
} from '../../../../src/shared/messaging/queue';

describe('parseQueueMessage', () => {
  it('accepts a progression message', () => {
    expect(parseQueueMessage('{"type":"orders.process-order","orderId":"order-1"}')).toEqual({
      type: 'orders.process-order',
      orderId: 'order-1',
    });
  });

  it.each([
    ['invalid JSON', '{"type":'],
    ['unknown type', '{"type":"orders.ship","orderId":"order-1"}'],
    ['missing orderId', '{"type":"orders.process-order"}'],
    ['empty orderId', '{"type":"orders.process-order","orderId":""}'],
    ['non-object', '"orders.process-order"'],
  ])('returns null for %s', (_label, raw) => {
    expect(parseQueueMessage(raw)).toBeNull();
  });
});

describe('parseQueueDelivery', () => {
  it('treats a payload without an attempt count as attempt 0', () => {
    expect(parseQueueDelivery('{"type":"orders.process-order","orderId":"order-1"}')).toEqual({
      message: { type: 'orders.process-order', orderId: 'order-1' },
      attempt: 0,
    });
  });

  it('keeps the attempt count out of the message', () => {
    expect(
      parseQueueDelivery('{"type":"orders.process-order","orderId":"order-1","attempt":2}'),
    ).toEqual({
      message: { type: 'orders.process-order', orderId: 'order-1' },
      attempt: 2,
    });
  });

  it.each([
    ['negative attempt', '{"type":"orders.process-order","orderId":"order-1","attempt":-1}'],
    ['fractional attempt', '{"type":"orders.process-order","orderId":"order-1","attempt":1.5}'],
    ['unknown type', '{"type":"orders.ship","orderId":"order-1","attempt":1}'],
  ])('returns null for %s', (_label, raw) => {
    expect(parseQueueDelivery(raw)).toBeNull();
  });

  it('encodes attempt 0 as the bare message', () => {
    const message = { type: 'orders.process-order' as const, orderId: 'order-1' };

    expect(encodeQueueDelivery({ message, attempt: 0 })).toBe(
      '{"type":"orders.process-order","orderId":"order-1"}',
    );
    expect(encodeQueueDelivery({ message, attempt: 3 })).toBe(
      '{"type":"orders.process-order","orderId":"order-1","attempt":3}',
    );
  });
});

describe('InMemQueue', () => {
  it('drain returns enqueued messages in order and empties the queue', async () => {
    const queue = new InMemQueue();
    await queue.enqueue({ type: 'orders.process-order', orderId: 'a' });
    await queue.enqueue({ type: 'orders.process-order', orderId: 'b' });

    expect(queue.drain().map((m) => m.orderId)).toEqual(['a', 'b']);
    expect(queue.drain()).toEqual([]);
  });

  it('failWith rejects only the next enqueue', async () => {
    const queue = new InMemQueue();
    const outage = new Error('queue unavailable');
    queue.failWith(outage);

    await expect(queue.enqueue({ type: 'orders.process-order', orderId: 'a' })).rejects.toBe(outage);
    await queue.enqueue({ type: 'orders.process-order', orderId: 'b' });

    expect(queue.drain().map((m) => m.orderId)).toEqual(['b']);
  });
});
