/**
 * backend/src/shared/cache/redis-client.ts
 *
 * One Redis connection per process, shared by the rate-limit cache and the job queue.
 * The client type is derived from createClient() rather than imported, so two
 * installed copies of @redis/client cannot produce conflicting types.
 */

import { createClient } from 'redis';
import { logger } from '../logger/logger';

export type RedisClient = ReturnType<typeof createClient>;

/** Connection errors happen outside any request, so they go to the global logger. */
export function logRedisErrors(client: RedisClient, role: string): RedisClient {
  client.on('error', (err: Error) => {
    logger.error('redis.client_error', { flow: 'redis', role, message: err.message });
  });
  return client;
}

export async function connectRedis(redisUrl: string): Promise<RedisClient> {
  const client = logRedisErrors(createClient({ url: redisUrl }), 'shared');
  await client.connect();
  return client;
}
