import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';

const PER_MINUTE_5 = { limit: 5, windowSeconds: 60 };

describe('RateLimiter', () => {
  it('allows up to `limit` hits and rejects the next one', async () => {
    const limiter = new RateLimiter(new InMemCache(() => 0), { prefix: 'rl' });

    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow('login:ip:10.0.0.1', PER_MINUTE_5);
    }

    await expect(limiter.hitOrThrow('login:ip:10.0.0.1', PER_MINUTE_5)).rejects.toBeInstanceOf(
      RateLimitError,
    );
    await expect(limiter.hitOrThrow('login:ip:10.0.0.1', PER_MINUTE_5)).rejects.toMatchObject({
      key: 'rl:login:ip:10.0.0.1',
      rule: PER_MINUTE_5,
      retryAfterSeconds: 60,
    });
  });

  it('reports the time left in the current window', async () => {
    let nowMs = 0;
    const limiter = new RateLimiter(new InMemCache(() => nowMs));
    const rule = { limit: 1, windowSeconds: 60 };

    await limiter.hitOrThrow('k', rule);
    nowMs = 45_500;

    await expect(limiter.hitOrThrow('k', rule)).rejects.toMatchObject({ retryAfterSeconds: 15 });
  });

  it('counts keys independently', async () => {
    const limiter = new RateLimiter(new InMemCache(() => 0));
    const rule = { limit: 1, windowSeconds: 60 };

    await limiter.hitOrThrow('a', rule);
    await expect(limiter.hitOrThrow('b', rule)).resolves.toBeUndefined();
  });

  it('starts a fresh window once the first window expires', async () => {
    let nowMs = 0;
    const limiter = new RateLimiter(new InMemCache(() => nowMs));
    const rule = { limit: 1, windowSeconds: 60 };

    await limiter.hitOrThrow('refresh:ip:10.0.0.1', rule);
    await expect(limiter.hitOrThrow('refresh:ip:10.0.0.1', rule)).rejects.toBeInstanceOf(
      RateLimitError,
    );

    nowMs = 60_000;
    await expect(limiter.hitOrThrow('refresh:ip:10.0.0.1', rule)).resolves.toBeUndefined();
  });

  it('never throws when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(() => 0), { disabled: true });

    for (let i = 0; i < 10; i++) {
      await limiter.hitOrThrow('x', { limit: 1, windowSeconds: 60 });
    }
  });
});
