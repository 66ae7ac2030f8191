/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> infra -> deps -> server -> routes
 * - Makes E2E tests simple (build with in-memory infra, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, connectInfra, type AppInfra, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(
  config: AppConfig,
  opts: { infra?: AppInfra; overrides?: DepsOverrides } = {},
) {
  const infra = opts.infra ?? (await connectInfra(config));
  const deps = buildDeps(config, infra, opts.overrides);
  const app = await buildServer();

  registerRoutes(app, { config, deps });
  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
