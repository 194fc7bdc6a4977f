/**
 * Pricing endpoints.
 * GET    /api/v1/pricings      List pricings
 * POST   /api/v1/pricings      Create a pricing (auth required)
 * PUT    /api/v1/pricings/:id  Replace a pricing (auth required)
 * DELETE /api/v1/pricings/:id  Delete a pricing (auth required)
 *
 * Every change re-matches all contracts in the background.
 */

import { pipeline, errorHandler, routeParam } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';
import type { PricingInput } from '../types/api.js';
import type { BodySchema } from '../types/common.js';

const pricingSchema: BodySchema = {
  startLocationId: { type: 'number', required: true, integer: true, min: 1 },
  endLocationId: { type: 'number', required: true, integer: true, min: 1 },
  isActive: { type: 'boolean', required: false },
  isBidirectional: { type: 'boolean', required: false },
  isDefault: { type: 'boolean', required: false },
  priceBase: { type: 'number', required: false, min: 0 },
  priceMin: { type: 'number', required: false, min: 0 },
  pricePerVolume: { type: 'number', required: false, min: 0 },
  usePricePerVolumeModifier: { type: 'boolean', required: false },
  pricePerCollateralPercent: { type: 'number', required: false, min: 0 },
  collateralMin: { type: 'number', required: false, min: 0 },
  collateralMax: { type: 'number', required: false, min: 0 },
  volumeMin: { type: 'number', required: false, min: 0 },
  volumeMax: { type: 'number', required: false, min: 0 },
  daysToExpire: { type: 'number', required: false, integer: true, min: 1 },
  daysToComplete: { type: 'number', required: false, integer: true, min: 1 },
  details: { type: 'string', required: false, maxLength: 2000 },
};

function pricingIdFrom(ctx: HandlerContext): number {
  const id = Number(routeParam(ctx, 'id'));
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError('Pricing id must be a positive integer');
  }
  return id;
}

export function createPricingHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
    const result = await container.pricingService.list();

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const create: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(pricingSchema)
  )(async (req, _ctx) => {
    const body = (await req.json()) as PricingInput;

    const result = await container.pricingService.create(body);

    return new Response(JSON.stringify(result), {
      status: 201,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const update: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(pricingSchema)
  )(async (req, ctx) => {
    const id = pricingIdFrom(ctx);
    const body = (await req.json()) as PricingInput;

    const result = await container.pricingService.update(id, body);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const del: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    await container.pricingService.remove(pricingIdFrom(ctx));

    return new Response(null, { status: 204 });
  });

  return { list, create, update, delete: del };
}
