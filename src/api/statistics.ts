/**
 * Statistics endpoints over finished contracts.
 * GET /api/v1/statistics/routes
 * GET /api/v1/statistics/pilots
 * GET /api/v1/statistics/pilot-corporations
 * GET /api/v1/statistics/customers
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';

export function createStatisticsHandlers(container: Container) {
  const respond = (load: () => Promise<unknown>): Handler =>
    pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
      const result = await load();

      return new Response(JSON.stringify(result), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      });
    });

  return {
    routes: respond(() => container.statisticsService.routes()),
    pilots: respond(() => container.statisticsService.pilots()),
    pilotCorporations: respond(() => container.statisticsService.pilotCorporations()),
    customers: respond(() => container.statisticsService.customers()),
  };
}
