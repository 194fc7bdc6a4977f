/**
 * Authentication middleware.
 * Compares the Bearer token with the configured admin key and marks the
 * request as coming from an operator. Without a configured key every
 * request is rejected.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'UNAUTHORIZED',
        message,
      },
    }),
    { status: 401, headers: JSON_HEADERS }
  );
}

function keysMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createAuthMiddleware(adminApiKey: string | null): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <api_key>');
      }

      const apiKey = authHeader.slice(7).trim();

      if (!apiKey) {
        return unauthorized('API key is empty');
      }

      if (!adminApiKey || !keysMatch(apiKey, adminApiKey)) {
        return unauthorized('Invalid API key');
      }

      ctx.operator = true;
      return next(req, ctx);
    };
  };
}
