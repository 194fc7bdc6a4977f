/**
 * Error handler middleware.
 * Maps errors thrown by handlers to structured JSON responses:
 * AppErrors carry their own status; ESI, token and webhook failures become
 * 4xx/5xx with a stable code; anything else is an opaque 500.
 */

import {
  AppError,
  EsiError,
  TokenExpiredError,
  TokenInvalidError,
  WebhookError,
} from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

interface ErrorReply {
  status: number;
  body: ApiErrorResponse;
}

function reply(status: number, code: string, message: string, details?: Record<string, unknown>): ErrorReply {
  return { status, body: { error: { code, message, ...(details && { details }) } } };
}

export function toErrorReply(err: unknown): ErrorReply {
  if (err instanceof AppError) {
    return reply(err.statusCode, err.code, err.message, err.details);
  }
  if (err instanceof EsiError) {
    return err.isTransient
      ? reply(503, 'UPSTREAM_UNAVAILABLE', 'ESI is currently unavailable', { path: err.path })
      : reply(502, 'ESI_ERROR', err.message, { status: err.status, path: err.path });
  }
  if (err instanceof TokenExpiredError) {
    return reply(403, 'TOKEN_EXPIRED', err.message);
  }
  if (err instanceof TokenInvalidError) {
    return reply(403, 'TOKEN_INVALID', err.message);
  }
  if (err instanceof WebhookError) {
    return reply(502, 'WEBHOOK_FAILED', err.message, { status: err.status });
  }
  return reply(500, 'INTERNAL_ERROR', 'An unexpected error occurred');
}

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      const { status, body } = toErrorReply(err);
      return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
      });
    }
  };
}
