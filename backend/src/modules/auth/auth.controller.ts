/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Shapes service results into the snake_case wire format.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in helpers/refresh-token-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireAuthUser } from '../../shared/http/require-auth-user';
import type { AuthGate } from './auth-gate';
import { AuthErrors } from './auth.errors';
import { loginSchema, refreshSchema, registerSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import type {
  AccessTokenResponse,
  RegisteredUserResponse,
  TokenPairResponse,
} from './auth.types';
import {
  clearRefreshTokenCookie,
  readRefreshTokenCookie,
  setRefreshTokenCookie,
} from './helpers/refresh-token-cookie';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly authGate: AuthGate,
    private readonly refreshCookieMaxAgeSeconds: number,
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('body', parsed.error.issues);
    }

    const user = await this.authService.register({
      name: parsed.data.name,
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    const body: RegisteredUserResponse = { id: user.id, name: user.name, email: user.email };
    return reply.status(201).send(body);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('body', parsed.error.issues);
    }

    const result = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    setRefreshTokenCookie(reply, result.refreshToken, this.refreshCookieMaxAgeSeconds);

    const body: TokenPairResponse = {
      access_token: result.accessToken,
      refresh_token: result.refreshToken,
      token_type: 'bearer',
    };
    return reply.status(200).send(body);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const parsed = refreshSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidInput('body', parsed.error.issues);
    }

    const refreshToken = parsed.data?.refresh_token || readRefreshTokenCookie(req);
    if (!refreshToken) throw AuthErrors.missingToken();

    const result = await this.authService.rotate({
      refreshToken,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    const body: AccessTokenResponse = { access_token: result.accessToken, token_type: 'bearer' };
    return reply.status(200).send(body);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const user = await requireAuthUser(req, this.authGate);

    await this.authService.logout(user, req.requestContext.requestId);

    clearRefreshTokenCookie(reply);
    return reply.status(204).send();
  }
}
