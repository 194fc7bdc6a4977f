/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Config, Context } from '@netlify/functions';
import { getProductionContainer } from '../../src/container.production.js';
import { createApiFunction } from '../../src/functions.js';

// Container is created once per cold start (shared across warm invocations)
const handle = createApiFunction(getProductionContainer());

export default async (req: Request, _context: Context) => {
  return handle(req);
};

export const config: Config = {
  path: '/api/v1/*',
};
