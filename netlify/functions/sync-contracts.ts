/**
 * Scheduled Netlify Function: pulls courier contracts from ESI every ten
 * minutes, then re-matches pricings and sends notifications.
 */

import type { Config, Context } from '@netlify/functions';
import { getProductionContainer } from '../../src/container.production.js';
import { runScheduledSync } from '../../src/functions.js';

export default async (_req: Request, _context: Context) => {
  await runScheduledSync(getProductionContainer());
};

export const config: Config = {
  schedule: '*/10 * * * *',
};
