/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Works with any runtime built on Web Request and Response.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createCalculatorHandlers } from './calculator.js';
import { createContractHandlers } from './contracts.js';
import { createHandlerHandlers } from './handler.js';
import { createLocationHandlers } from './locations.js';
import { createPricingHandlers } from './pricings.js';
import { createStatisticsHandlers } from './statistics.js';
import { createJobHandlers } from './sync.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const handler = createHandlerHandlers(container);
  const jobs = createJobHandlers(container);
  const contracts = createContractHandlers(container);
  const pricings = createPricingHandlers(container);
  const calculator = createCalculatorHandlers(container);
  const locations = createLocationHandlers(container);
  const statistics = createStatisticsHandlers(container);

  const routes: Route[] = [
    // Contract handler
    { method: 'GET', pattern: /^\/api\/v1\/handler\/?$/, handler: handler.status },
    { method: 'POST', pattern: /^\/api\/v1\/handler\/?$/, handler: handler.setup },

    // Jobs
    { method: 'POST', pattern: /^\/api\/v1\/sync\/?$/, handler: jobs.sync },
    { method: 'POST', pattern: /^\/api\/v1\/notifications\/?$/, handler: jobs.notify },
    { method: 'POST', pattern: /^\/api\/v1\/pricing-update\/?$/, handler: jobs.updatePricing },

    // Contracts
    { method: 'GET', pattern: /^\/api\/v1\/contracts\/?$/, handler: contracts.list },

    // Pricings
    { method: 'GET', pattern: /^\/api\/v1\/pricings\/?$/, handler: pricings.list },
    { method: 'POST', pattern: /^\/api\/v1\/pricings\/?$/, handler: pricings.create },
    { method: 'PUT', pattern: /^\/api\/v1\/pricings\/(?<id>[^/]+)\/?$/, handler: pricings.update },
    { method: 'DELETE', pattern: /^\/api\/v1\/pricings\/(?<id>[^/]+)\/?$/, handler: pricings.delete },

    // Calculator
    { method: 'POST', pattern: /^\/api\/v1\/calculator\/?$/, handler: calculator.calculate },

    // Locations
    { method: 'POST', pattern: /^\/api\/v1\/locations\/?$/, handler: locations.add },

    // Statistics
    { method: 'GET', pattern: /^\/api\/v1\/statistics\/routes\/?$/, handler: statistics.routes },
    { method: 'GET', pattern: /^\/api\/v1\/statistics\/pilots\/?$/, handler: statistics.pilots },
    {
      method: 'GET',
      pattern: /^\/api\/v1\/statistics\/pilot-corporations\/?$/,
      handler: statistics.pilotCorporations,
    },
    { method: 'GET', pattern: /^\/api\/v1\/statistics\/customers\/?$/, handler: statistics.customers },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      const match = route.method === method ? route.pattern.exec(url.pathname) : null;
      if (match) {
        const response = await route.handler(req, { ...ctx, params: { ...match.groups } });
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
