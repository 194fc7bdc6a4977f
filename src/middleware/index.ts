export { pipeline, routeParam } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler, toErrorReply } from './error-handler.js';
export { createAuthMiddleware } from './authenticate.js';
export { validateBody } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
