/**
 * src/shared/cache/inmem-cache.ts
 *
 * Map-backed Cache for tests. Same window semantics as RedisCache; pass a clock
 * to make window expiry deterministic: `new InMemCache(() => fakeNowMs)`.
 */

import type { Cache, WindowCount } from './cache';

type Window = { count: number; resetsAtMs: number };

export class InMemCache implements Cache {
  private readonly windows = new Map<string, Window>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  hitWindow(key: string, windowSeconds: number): Promise<WindowCount> {
    const nowMs = this.now();

    let window = this.windows.get(key);
    if (!window || window.resetsAtMs <= nowMs) {
      window = { count: 0, resetsAtMs: nowMs + windowSeconds * 1000 };
      this.windows.set(key, window);
    }

    window.count += 1;

    return Promise.resolve({
      count: window.count,
      resetsInSeconds: Math.ceil((window.resetsAtMs - nowMs) / 1000),
    });
  }
}
