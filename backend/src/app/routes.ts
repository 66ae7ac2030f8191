/**
 * backend/src/app/routes.ts
 *
 * Registers /health and every module's routes. Wiring only.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export type HealthResponse = {
  ok: true;
  env: AppConfig['nodeEnv'];
  service: string;
  requestId: string;
};

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/health', async (req): Promise<HealthResponse> => ({
    ok: true,
    env: opts.config.nodeEnv,
    service: opts.config.serviceName,
    requestId: req.requestContext.requestId,
  }));

  opts.deps.auth.registerRoutes(app);
  opts.deps.orders.registerRoutes(app);
}
