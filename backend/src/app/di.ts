/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app (HTTP server and worker).
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Tests hand in in-memory infra through the same seam.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import type { Cache } from '../shared/cache/cache';
import { RedisCache } from '../shared/cache/redis-cache';
import { connectRedis } from '../shared/cache/redis-client';

import type { Queue, QueueConsumer } from '../shared/messaging/queue';
import { RedisQueue } from '../shared/messaging/redis-queue';

import { RateLimiter } from '../shared/security/rate-limit';
import { TokenCodec } from '../shared/security/token-codec';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { KyselyUserRepo, type UserRepo } from '../modules/users';
import {
  createAuthModule,
  KyselyRefreshTokenRepo,
  type AuthModule,
  type RefreshTokenRepo,
} from '../modules/auth';
import { createOrderModule, KyselyOrderRepo, type OrderModule, type OrderRepo } from '../modules/orders';
import type { Sleep } from '../modules/orders';

/** Everything that talks to the outside world. Swapped for in-memory versions in tests. */
export type AppInfra = {
  userRepo: UserRepo;
  refreshTokenRepo: RefreshTokenRepo;
  orderRepo: OrderRepo;
  cache: Cache;
  queue: Queue;
  close: () => Promise<void>;
};

export type ProductionInfra = AppInfra & {
  consumer: QueueConsumer;
};

export type AppDeps = {
  config: AppConfig;
  infra: AppInfra;

  logger: Logger;
  rateLimiter: RateLimiter;
  tokenCodec: TokenCodec;
  passwordHasher: PasswordHasher;

  // modules
  auth: AuthModule;
  orders: OrderModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Test/runtime seams that do not come from env. */
export type DepsOverrides = {
  clock?: () => Date;
  sleep?: Sleep;
};

export async function connectInfra(config: AppConfig): Promise<ProductionInfra> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod): rate-limit windows and the job queue share one client.
  const redis = await connectRedis(config.redisUrl);
  const queue = RedisQueue.fromClient(redis, {
    name: config.orders.queueName,
    maxAttempts: config.orders.queueMaxAttempts,
    retryDelayMs: config.orders.queueRetryDelayMs,
  });

  return {
    userRepo: new KyselyUserRepo(db),
    refreshTokenRepo: new KyselyRefreshTokenRepo(db),
    orderRepo: new KyselyOrderRepo(db),
    cache: new RedisCache(redis),
    queue,
    consumer: queue,
    close: async () => {
      queue.stop();
      await redis.quit();
      await db.destroy();
    },
  };
}

export function buildDeps(
  config: AppConfig,
  infra: AppInfra,
  overrides: DepsOverrides = {},
): AppDeps {
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // Signing config is handed over explicitly; the codec never reads env.
  const tokenCodec = new TokenCodec(
    { secret: config.jwt.secret, algorithm: config.jwt.algorithm },
    overrides.clock,
  );

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(infra.cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const auth = createAuthModule({
    userRepo: infra.userRepo,
    refreshTokenRepo: infra.refreshTokenRepo,
    tokenCodec,
    passwordHasher,
    rateLimiter,
    logger,
    lifetimes: {
      accessTokenTtlSeconds: config.jwt.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.jwt.refreshTokenTtlSeconds,
    },
    clock: overrides.clock,
  });

  const orders = createOrderModule({
    orderRepo: infra.orderRepo,
    queue: infra.queue,
    logger,
    authenticator: auth.authGate,
    progressionStepMs: config.orders.progressionStepMs,
    sleep: overrides.sleep,
    clock: overrides.clock,
  });

  return {
    config,
    infra,
    logger,
    rateLimiter,
    tokenCodec,
    passwordHasher,
    auth,
    orders,
    close: () => infra.close(),
  };
}
