/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 * - Exposes authGate so other modules can protect their routes with the same check.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import { AuthGate } from './auth-gate';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService } from './auth.service';

export type AuthModuleDeps = ConstructorParameters<typeof AuthService>[0];

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: AuthModuleDeps) {
  const authService = new AuthService(deps);

  // The gate needs no rate limiter or hasher: it only verifies and looks up.
  const authGate = new AuthGate({
    tokenCodec: deps.tokenCodec,
    userRepo: deps.userRepo,
    logger: deps.logger,
  });

  const controller = new AuthController(
    authService,
    authGate,
    deps.lifetimes.refreshTokenTtlSeconds,
  );

  return {
    authService,
    authGate,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
