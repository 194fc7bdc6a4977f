/**
 * Application error hierarchy.
 * AppError subclasses carry an HTTP status and a stable machine-readable code;
 * the error-handler middleware turns them into JSON responses.
 * Integration errors (ESI, tokens, webhooks) are plain Error subclasses the
 * sync pipeline translates into handler error codes.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super('FORBIDDEN', message, 403);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super('NOT_FOUND', message, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 409, details);
    this.name = 'ConflictError';
  }
}

// ── Integration errors ──

/** HTTP error returned by ESI after retries (if any) were exhausted. */
export class EsiError extends Error {
  constructor(
    readonly status: number,
    readonly path: string,
    message: string
  ) {
    super(`ESI error (${status}) for ${path}: ${message}`);
    this.name = 'EsiError';
  }

  /** 502, 503 and 504 are worth retrying. */
  get isTransient(): boolean {
    return this.status === 502 || this.status === 503 || this.status === 504;
  }

  /** 401 and 403 mean the token has no access to the resource. */
  get isForbidden(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class TokenExpiredError extends Error {
  constructor(message = 'Token expired') {
    super(message);
    this.name = 'TokenExpiredError';
  }
}

export class TokenInvalidError extends Error {
  constructor(message = 'Token invalid') {
    super(message);
    this.name = 'TokenInvalidError';
  }
}

export class WebhookError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(`Webhook error (${status}): ${message}`);
    this.name = 'WebhookError';
  }
}
