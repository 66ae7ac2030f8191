/**
 * src/shared/security/rate-limit.ts
 *
 * Fixed-window limiter for the credential endpoints (rules live with the caller,
 * e.g. auth.service.ts). Depends only on Cache.
 *
 * INCR-then-check: two concurrent hits both count, and whichever pushes the window
 * past `limit` is rejected. `disabled` is set by the composition root (tests);
 * this class never looks at NODE_ENV.
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = { limit: number; windowSeconds: number };

export class RateLimitError extends Error {
  constructor(
    readonly key: string,
    readonly rule: RateLimitRule,
    readonly retryAfterSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts: { prefix?: string; disabled?: boolean } = {},
  ) {}

  /** Counts one hit against `key`; throws RateLimitError once the window is over `rule.limit`. */
  async hitOrThrow(key: string, rule: RateLimitRule): Promise<void> {
    if (this.opts.disabled) return;

    const fullKey = this.opts.prefix ? `${this.opts.prefix}:${key}` : key;
    const window = await this.cache.hitWindow(fullKey, rule.windowSeconds);

    if (window.count > rule.limit) {
      throw new RateLimitError(fullKey, rule, window.resetsInSeconds);
    }
  }
}
