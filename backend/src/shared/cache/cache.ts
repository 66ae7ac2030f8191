/**
 * src/shared/cache/cache.ts
 *
 * Fixed-window hit counters backing the rate limiter.
 * A window opens on its first hit and is never extended by later hits.
 * Redis in production (redis-cache.ts), a Map in tests (inmem-cache.ts).
 */

export type WindowCount = {
  /** Hits in the current window, this one included. */
  count: number;
  /** Seconds until the window closes and the count starts over. */
  resetsInSeconds: number;
};

export interface Cache {
  hitWindow(key: string, windowSeconds: number): Promise<WindowCount>;
}
