/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Signing secret + algorithm are read ONCE here and handed to the token codec
 *   by reference. Nothing below the composition root reads process.env.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv and jwt.algorithm are unions, not plain strings, so invalid values
 *   ('prod', 'RS256') are rejected at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';
import { JWT_ALGORITHMS, type JwtAlgorithm } from '../shared/security/token-codec';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('orderdesk-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Tokens
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(15),
  REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().min(1).max(90).default(7),

  // Order progression job
  ORDER_QUEUE_NAME: z.string().min(1).default('orders:progression'),
  ORDER_PROGRESSION_STEP_MS: z.coerce.number().int().min(0).default(5000),
  ORDER_QUEUE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  ORDER_QUEUE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: {
    secret: string;
    algorithm: JwtAlgorithm;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  };

  orders: {
    queueName: string;
    progressionStepMs: number;
    /** Handler attempts per message before it is dropped. */
    queueMaxAttempts: number;
    /** First retry delay; doubles on each further failure. */
    queueRetryDelayMs: number;
  };
};

export function buildConfig(): AppConfig {
  const parsed = ConfigSchema.parse(process.env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      accessTokenTtlSeconds: parsed.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
      refreshTokenTtlSeconds: parsed.REFRESH_TOKEN_EXPIRE_DAYS * 24 * 60 * 60,
    },

    orders: {
      queueName: parsed.ORDER_QUEUE_NAME,
      progressionStepMs: parsed.ORDER_PROGRESSION_STEP_MS,
      queueMaxAttempts: parsed.ORDER_QUEUE_MAX_ATTEMPTS,
      queueRetryDelayMs: parsed.ORDER_QUEUE_RETRY_DELAY_MS,
    },
  };
}
