/**
 * Request logging middleware.
 * One event per request with method, path (without query), status, duration
 * and operator flag. Error responses also carry the `error.code` of their body,
 * so a failed sync or a rejected pricing shows up by code in Axiom.
 *
 * Level mapping: 2xx → info, 4xx → warn, 5xx and thrown errors → error.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import { toErrorReply } from './error-handler.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

/** `error.code` of a JSON error body, or undefined for anything else. */
async function errorCodeOf(response: Response): Promise<string | undefined> {
  if (response.status < 400 || !response.headers.get('Content-Type')?.includes('application/json')) {
    return undefined;
  }

  const body: unknown = await response.clone().json().catch(() => null);
  if (typeof body !== 'object' || body === null || !('error' in body)) return undefined;

  const { error } = body;
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  function requestEvent(
    req: Request,
    ctx: HandlerContext,
    status: number,
    start: number,
    extra: Partial<RequestLogEvent>
  ): RequestLogEvent {
    const path = new URL(req.url).pathname;
    const durationMs = Math.round(performance.now() - start);

    return {
      level: levelForStatus(status),
      message: `${req.method} ${path} → ${status} (${durationMs}ms)`,
      method: req.method,
      path,
      status,
      durationMs,
      ...(ctx.operator && { operator: true }),
      ...extra,
    };
  }

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const start = performance.now();

      try {
        const response = await next(req, ctx);
        const errorCode = await errorCodeOf(response);

        logProvider.log(requestEvent(req, ctx, response.status, start, errorCode ? { errorCode } : {}));
        return response;
      } catch (err) {
        const { status, body } = toErrorReply(err);

        logProvider.log(
          requestEvent(req, ctx, status, start, {
            level: 'error',
            errorCode: body.error.code,
            fields: { error: err instanceof Error ? err.message : String(err) },
          })
        );
        throw err;
      }
    };
  };
}
