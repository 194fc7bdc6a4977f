/**
 * Location endpoints.
 * POST /api/v1/locations  Add or refresh a station or structure from ESI (auth required)
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';

const addSchema: BodySchema = {
  locationId: { type: 'number', required: true, integer: true, min: 1 },
};

export function createLocationHandlers(container: Container) {
  const add: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(addSchema)
  )(async (req, _ctx) => {
    const body = (await req.json()) as { locationId: number };

    const result = await container.locationService.addLocation(body.locationId);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { add };
}
