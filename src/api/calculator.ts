/**
 * Calculator endpoint.
 * POST /api/v1/calculator  Price for a planned shipment
 *   volume in K m3, collateral in M ISK; pricingId defaults to the default pricing
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { CalculatorRequest } from '../types/api.js';
import type { BodySchema } from '../types/common.js';

const calculatorSchema: BodySchema = {
  pricingId: { type: 'number', required: false, integer: true, min: 1 },
  volume: { type: 'number', required: false, min: 0 },
  collateral: { type: 'number', required: false, min: 0 },
};

export function createCalculatorHandlers(container: Container) {
  const calculate: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(calculatorSchema)
  )(async (req, _ctx) => {
    const body = (await req.json()) as CalculatorRequest;

    const result = await container.calculatorService.calculate(body);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { calculate };
}
