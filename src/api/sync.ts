/**
 * Job endpoints (auth required).
 * POST /api/v1/sync            Sync contracts from ESI now
 * POST /api/v1/notifications   Send pending notifications now
 * POST /api/v1/pricing-update  Re-match all contracts to pricings
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { SendNotificationsRequest, SyncRequest } from '../types/api.js';
import type { BodySchema } from '../types/common.js';

const forceSchema: BodySchema = {
  force: { type: 'boolean', required: false },
};

export function createJobHandlers(container: Container) {
  const sync: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(forceSchema)
  )(async (req, _ctx) => {
    const body = (await req.json()) as SyncRequest;

    const result = await container.jobs.syncContracts(body.force ?? false);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const notify: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(forceSchema)
  )(async (req, _ctx) => {
    const body = (await req.json()) as SendNotificationsRequest;

    const result = await container.jobs.sendNotifications(body.force ?? false);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const updatePricing: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate
  )(async (_req, _ctx) => {
    const result = await container.jobs.updatePricing();

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { sync, notify, updatePricing };
}
