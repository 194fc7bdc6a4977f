/**
 * Composable middleware pipeline for HTTP handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Set by the auth middleware when the request carried the admin key. */
  operator: boolean;
  /** Named groups of the matched route pattern, e.g. `{ id: '3' }` for /pricings/3. */
  params?: Record<string, string>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler:
 *   pipeline(logging, errorHandler, auth)(handler)
 *   → logging wraps (errorHandler wraps (auth wraps handler))
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
}

/** Named route parameter, or null when the matched route has none by that name. */
export function routeParam(ctx: HandlerContext, name: string): string | null {
  return ctx.params?.[name] ?? null;
}
