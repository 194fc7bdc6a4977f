/**
 * Contract handler endpoints.
 * GET  /api/v1/handler  Sync status of the contract handler
 * POST /api/v1/handler  Set up the handler from a sync character (auth required)
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { SetupHandlerRequest } from '../types/api.js';
import type { BodySchema } from '../types/common.js';

const setupSchema: BodySchema = {
  characterId: { type: 'number', required: true, integer: true, min: 1 },
  ownerUserId: { type: 'string', required: false, maxLength: 100 },
  pricePerVolumeModifier: { type: 'number', required: false, min: -100, max: 1000 },
};

export function createHandlerHandlers(container: Container) {
  const status: Handler = pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
    const result = await container.handlerService.status();

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const setup: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(setupSchema)
  )(async (req, _ctx) => {
    const body = (await req.json()) as SetupHandlerRequest;

    const handler = await container.handlerService.setup(body);
    container.jobs.startSync(true);
    const result = await container.handlerService.status();

    return new Response(JSON.stringify({ ...result, id: handler.id }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { status, setup };
}
