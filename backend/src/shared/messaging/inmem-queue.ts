/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what jobs the service enqueued without a broker.
 * - drain() is the test contract: call it after the request completes to get all
 *   enqueued messages, then hand them to the worker or assert on them.
 *
 * RULES:
 * - Implements Queue only: services never see drain().
 * - `failWith` lets a test simulate a broker outage for the next enqueue.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];
  private pendingFailure: Error | null = null;

  enqueue(message: QueueMessage): Promise<void> {
    if (this.pendingFailure) {
      const err = this.pendingFailure;
      this.pendingFailure = null;
      return Promise.reject(err);
    }

    this.messages.push(message);
    return Promise.resolve();
  }

  /** Makes the next enqueue() reject with `err`. */
  failWith(err: Error): void {
    this.pendingFailure = err;
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
