/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "an order needs progressing" from "here is how jobs travel".
 *   Services enqueue messages; the transport (Redis list, in-memory) is chosen
 *   at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable and carry ids only, never tokens or PII.
 * - Delivery is at-least-once: consumers must tolerate duplicates.
 */

import { z } from 'zod';

// ── Message types ─────────────────────────────────────────────

export const orderProgressionMessageSchema = z.object({
  type: z.literal('orders.process-order'),
  orderId: z.string().min(1),
});

export type OrderProgressionMessage = z.infer<typeof orderProgressionMessageSchema>;

// Add new message types to this union; parseQueueMessage picks them up.
export const queueMessageSchema = z.discriminatedUnion('type', [orderProgressionMessageSchema]);

export type QueueMessage = z.infer<typeof queueMessageSchema>;

// Transports that retry keep a failure count beside the message fields.
const attemptSchema = z.object({ attempt: z.number().int().min(0).default(0) });

/** A message as read off a transport, with the handler failures it has seen so far. */
export type QueueDelivery = {
  message: QueueMessage;
  attempt: number;
};

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Parses a raw transport payload. Returns null for anything that is not valid JSON
 * or not a known message shape.
 */
export function parseQueueMessage(raw: string): QueueMessage | null {
  const parsed = queueMessageSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : null;
}

/** parseQueueMessage plus the attempt count; a payload without one is attempt 0. */
export function parseQueueDelivery(raw: string): QueueDelivery | null {
  const json = parseJson(raw);
  const message = queueMessageSchema.safeParse(json);
  const attempt = attemptSchema.safeParse(json);
  if (!message.success || !attempt.success) return null;
  return { message: message.data, attempt: attempt.data.attempt };
}

export function encodeQueueDelivery(delivery: QueueDelivery): string {
  if (delivery.attempt === 0) return JSON.stringify(delivery.message);
  return JSON.stringify({ ...delivery.message, attempt: delivery.attempt });
}

// ── Queue interfaces ──────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}

export type QueueHandler = (message: QueueMessage) => Promise<void>;

export interface QueueConsumer {
  /** Resolves once stop() has been called and the in-flight message is settled. */
  consume(handler: QueueHandler): Promise<void>;
  stop(): void;
}
