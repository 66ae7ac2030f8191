/**
 * backend/src/shared/messaging/redis-queue.ts
 *
 * WHY:
 * - Production transport for background jobs, on the same Redis that holds the
 *   rate-limit counters (no extra broker to run).
 *
 * HOW IT WORKS (reliable-queue pattern):
 * - enqueue:  LPUSH <name> <json>
 * - consume:  BLMOVE <name> → <name>:processing (RIGHT → LEFT), run handler,
 *             then LREM the payload from the processing list.
 * - A crash between BLMOVE and LREM leaves the payload in the processing list;
 *   the next consume() moves it back before reading new work (at-least-once).
 * - Handler failure: logged, then after retryDelayMs * 2^(failures - 1) the
 *   payload goes back onto <name> with its attempt count raised. At maxAttempts
 *   failures it is logged as dropped and removed.
 * - Unparseable payload: logged and dropped (retrying cannot fix it).
 *
 * RULES:
 * - BLMOVE blocks its connection, so consume() opens a dedicated one.
 * - The shared client is owned (and quit) by the composition root.
 * - The retry delay runs on the consumer loop: nothing else is read meanwhile.
 */

import { setTimeout as delay } from 'node:timers/promises';

import { logger } from '../logger/logger';
import { logRedisErrors, type RedisClient } from '../cache/redis-client';
import { encodeQueueDelivery, parseQueueDelivery } from './queue';
import type { Queue, QueueConsumer, QueueHandler, QueueMessage } from './queue';

// BLMOVE timeout: how often the loop wakes up to notice stop().
const BLOCK_TIMEOUT_SECONDS = 1;

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_RETRY_DELAY_MS = 1000;

export type ListSide = 'LEFT' | 'RIGHT';

/** The Redis list commands the queue issues on the shared connection. */
export interface ListCommands {
  lPush(key: string, element: string): Promise<number>;
  lRem(key: string, count: number, element: string): Promise<number>;
  lMove(source: string, destination: string, from: ListSide, to: ListSide): Promise<string | null>;
}

/** A connection reserved for BLMOVE. */
export interface BlockingListConnection {
  blMove(
    source: string,
    destination: string,
    from: ListSide,
    to: ListSide,
    timeoutSeconds: number,
  ): Promise<string | null>;
  close(): Promise<void>;
}

export type RedisQueueOptions = {
  name: string;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export class RedisQueue implements Queue, QueueConsumer {
  private running = false;
  private readonly name: string;
  private readonly processingKey: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly lists: ListCommands,
    private readonly openBlocking: () => Promise<BlockingListConnection>,
    opts: RedisQueueOptions,
  ) {
    this.name = opts.name;
    this.processingKey = `${opts.name}:processing`;
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
  }

  static fromClient(client: RedisClient, opts: RedisQueueOptions): RedisQueue {
    const lists: ListCommands = {
      lPush: (key, element) => client.lPush(key, element),
      lRem: (key, count, element) => client.lRem(key, count, element),
      lMove: (source, destination, from, to) => client.lMove(source, destination, from, to),
    };

    const openBlocking = async (): Promise<BlockingListConnection> => {
      const blocking = logRedisErrors(client.duplicate(), `queue-consumer:${opts.name}`);
      await blocking.connect();
      return {
        blMove: (source, destination, from, to, timeoutSeconds) =>
          blocking.blMove(source, destination, from, to, timeoutSeconds),
        close: async () => {
          await blocking.quit();
        },
      };
    };

    return new RedisQueue(lists, openBlocking, opts);
  }

  async enqueue(message: QueueMessage): Promise<void> {
    await this.lists.lPush(this.name, encodeQueueDelivery({ message, attempt: 0 }));
  }

  async consume(handler: QueueHandler): Promise<void> {
    const blocking = await this.openBlocking();

    const requeued = await this.requeueOrphans();
    if (requeued > 0) {
      logger.warn('queue.requeued_orphans', { flow: 'queue.consume', queue: this.name, requeued });
    }

    this.running = true;
    try {
      while (this.running) {
        const raw = await blocking.blMove(
          this.name,
          this.processingKey,
          'RIGHT',
          'LEFT',
          BLOCK_TIMEOUT_SECONDS,
        );
        if (raw === null) continue;

        await this.dispatch(raw, handler);
      }
    } finally {
      await blocking.close();
    }
  }

  stop(): void {
    this.running = false;
  }

  /** Settles one payload that is already on the processing list. */
  async dispatch(raw: string, handler: QueueHandler): Promise<void> {
    const delivery = parseQueueDelivery(raw);

    if (!delivery) {
      logger.error('queue.malformed_message', { flow: 'queue.consume', queue: this.name });
      await this.lists.lRem(this.processingKey, 1, raw);
      return;
    }

    try {
      await handler(delivery.message);
    } catch (err: unknown) {
      const failures = delivery.attempt + 1;

      logger.error('queue.handler_failed', {
        flow: 'queue.consume',
        queue: this.name,
        type: delivery.message.type,
        attempt: failures,
        maxAttempts: this.maxAttempts,
        message: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });

      if (failures >= this.maxAttempts) {
        logger.error('queue.message_dropped', {
          flow: 'queue.consume',
          queue: this.name,
          type: delivery.message.type,
          attempts: failures,
        });
      } else {
        await this.sleep(this.retryDelayMs * 2 ** (failures - 1));
        await this.lists.lPush(
          this.name,
          encodeQueueDelivery({ message: delivery.message, attempt: failures }),
        );
      }
    }

    await this.lists.lRem(this.processingKey, 1, raw);
  }

  private async requeueOrphans(): Promise<number> {
    let moved = 0;
    while ((await this.lists.lMove(this.processingKey, this.name, 'RIGHT', 'LEFT')) !== null) {
      moved += 1;
    }
    return moved;
  }
}
