/**
 * backend/src/worker.ts
 *
 * WHY:
 * - Background entrypoint: consumes the order progression queue and drives each
 *   order PENDING → PROCESSING → COMPLETED.
 * - Shares config, infra and module wiring with the HTTP process.
 */

import { buildConfig } from './app/config';
import { buildDeps, connectInfra } from './app/di';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const infra = await connectInfra(config);
  const deps = buildDeps(config, infra);

  const worker = deps.orders.progressionWorker;

  const shutdown = (signal: string) => {
    logger.info('worker.shutdown', { signal });
    infra.consumer.stop();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('worker.started', {
    queue: config.orders.queueName,
    stepMs: config.orders.progressionStepMs,
  });

  await infra.consumer.consume(async (message) => {
    const outcome = await worker.handle(message);
    logger.info('worker.message_done', { type: message.type, orderId: message.orderId, outcome });
  });

  await deps.close();
  logger.info('worker.stopped');
}

void main().catch((err: unknown) => {
  logger.error('worker.fatal_error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
