/**
 * backend/src/shared/http/errors.ts
 *
 * AppError is the only error that reaches a client with its own code and message.
 * The HTTP status is looked up from the code, so two modules raising the same
 * code can never answer with different statuses.
 *
 * Module-specific factories live with their module (auth.errors.ts, order.errors.ts).
 */

export const APP_ERROR_STATUS = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 422,
  DUPLICATE_EMAIL: 400,
  INVALID_CREDENTIALS: 401,
  MISSING_TOKEN: 400,
  INVALID_REFRESH_TOKEN: 401,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 400,
  RATE_LIMITED: 429,
  INTERNAL: 500,
} as const satisfies Record<string, number>;

export type AppErrorCode = keyof typeof APP_ERROR_STATUS;

/** Logged server-side only; never part of a response body. */
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly status: number;

  constructor(
    readonly code: AppErrorCode,
    message: string,
    readonly meta?: AppErrorMeta,
  ) {
    super(message);
    this.name = 'AppError';
    this.status = APP_ERROR_STATUS[code];
  }

  /** Request body, query or params did not match the route's schema. */
  static invalidInput(where: 'body' | 'query' | 'params', issues: unknown): AppError {
    return new AppError('VALIDATION_ERROR', `Invalid request ${where}.`, { issues });
  }
}
