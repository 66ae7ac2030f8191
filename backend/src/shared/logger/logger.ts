/**
 * backend/src/shared/logger/logger.ts
 *
 * One winston logger for the HTTP process and the progression worker, so both
 * emit the same JSON shape with `service` and `env` on every line.
 *
 * Services receive it through their deps; request handlers use
 * requestLogger(req), which adds requestId and userId.
 *
 * Credential-bearing keys (passwords, hashes, tokens, cookies) are replaced by
 * [REDACTED] at any depth before a record is written. Emails go out as domain only.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'orderdesk-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export type Logger = winston.Logger;

export const REDACTED = '[REDACTED]';

const SECRET_KEYS = new Set([
  'password',
  'passwordHash',
  'password_hash',
  'token',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'secret',
  'authorization',
  'cookie',
]);

const MAX_REDACT_DEPTH = 5;

function redactValue(value: unknown, depth: number): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (value instanceof Date || value instanceof Error) return value;
  if (depth >= MAX_REDACT_DEPTH) return value;

  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));

  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = SECRET_KEYS.has(key) ? REDACTED : redactValue(inner, depth + 1);
  }
  return out;
}

export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = SECRET_KEYS.has(key) ? REDACTED : redactValue(info[key], 0);
  }
  return info;
});

export const logger: Logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
