/**
 * Price calculator for planned shipments.
 * Volume is entered in thousands of m3, collateral in millions of ISK.
 */

import { NotFoundError, ValidationError } from '../errors.js';
import type { IContractHandlerRepository } from '../repositories/IContractHandlerRepository.js';
import type { ILocationRepository } from '../repositories/ILocationRepository.js';
import type { CalculatorRequest, CalculatorResponse } from '../types/api.js';
import { routeName } from '../utils/format.js';
import {
  calculatePrice,
  getPriceCheckIssues,
  requiresCollateral,
  requiresVolume,
  type PricingService,
} from './PricingService.js';

export class CalculatorService {
  constructor(
    private readonly pricingService: PricingService,
    private readonly handlerRepo: IContractHandlerRepository,
    private readonly locationRepo: ILocationRepository
  ) {}

  async calculate(input: CalculatorRequest): Promise<CalculatorResponse> {
    const pricing = await this.pricingService.getOrDefault(input.pricingId);
    if (!pricing) {
      throw new NotFoundError('No active pricing defined');
    }

    if (requiresVolume(pricing) && !input.volume) {
      throw new ValidationError('volume is required');
    }
    if (requiresCollateral(pricing) && !input.collateral) {
      throw new ValidationError('collateral is required');
    }

    const volume = (input.volume ?? 0) * 1000;
    const collateral = (input.collateral ?? 0) * 1_000_000;
    const handler = await this.handlerRepo.find();
    const modifier = handler?.price_per_volume_modifier ?? null;

    const [start, end] = await Promise.all([
      this.locationRepo.findById(pricing.start_location_id),
      this.locationRepo.findById(pricing.end_location_id),
    ]);

    return {
      pricingId: pricing.id,
      route: routeName(start, end),
      price: calculatePrice(pricing, volume, collateral, modifier),
      volume,
      collateral,
      issues: getPriceCheckIssues(pricing, volume, collateral, null, modifier),
      daysToExpire: pricing.days_to_expire,
      daysToComplete: pricing.days_to_complete,
      details: pricing.details,
    };
  }
}
