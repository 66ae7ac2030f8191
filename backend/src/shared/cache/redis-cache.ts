/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * Rate-limit windows on Redis. INCR, EXPIRE NX and TTL run in one MULTI, so the
 * TTL is attached only by the hit that created the key (Redis >= 7 for NX).
 */

import type { Cache, WindowCount } from './cache';
import type { RedisClient } from './redis-client';

export class RedisCache implements Cache {
  constructor(private readonly client: RedisClient) {}

  async hitWindow(key: string, windowSeconds: number): Promise<WindowCount> {
    const [count, , ttl] = await this.client
      .multi()
      .incr(key)
      .expire(key, windowSeconds, 'NX')
      .ttl(key)
      .exec();

    if (typeof count !== 'number' || typeof ttl !== 'number') {
      throw new Error(`Unexpected MULTI reply for rate-limit key ${key}`);
    }

    return { count, resetsInSeconds: ttl > 0 ? ttl : windowSeconds };
  }
}
