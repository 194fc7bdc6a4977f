/**
 * Pricing service.
 * Price calculation and price checks for a single pricing, matching of
 * contracts to pricings, and pricing management.
 */

import { NotFoundError, ValidationError } from '../errors.js';
import { CONTRACTS_QUEUE, type TaskQueue } from '../jobs/TaskQueue.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IContractHandlerRepository } from '../repositories/IContractHandlerRepository.js';
import type { IContractRepository } from '../repositories/IContractRepository.js';
import type { ILocationRepository } from '../repositories/ILocationRepository.js';
import type { IPricingRepository } from '../repositories/IPricingRepository.js';
import type { PricingInput, PricingResponse } from '../types/api.js';
import type { ContractRow, PricingInsert, PricingRow } from '../types/database.js';
import { formatMillionIsk, formatThousandM3, routeName } from '../utils/format.js';

type PriceComponents = Pick<
  PricingRow,
  | 'price_base'
  | 'price_min'
  | 'price_per_volume'
  | 'use_price_per_volume_modifier'
  | 'price_per_collateral_percent'
>;

type PriceCheckRules = PriceComponents &
  Pick<PricingRow, 'volume_min' | 'volume_max' | 'collateral_min' | 'collateral_max'>;

export interface ReconcileResult {
  checked: number;
  matched: number;
  cleared: number;
}

// ── Pure pricing math ──

export function hasPriceComponent(pricing: PriceComponents): boolean {
  return Boolean(
    pricing.price_base ||
      pricing.price_min ||
      pricing.price_per_volume ||
      pricing.price_per_collateral_percent
  );
}

/** Throws ValidationError when the pricing can not produce a price. */
export function assertPriceComponent(pricing: PriceComponents): void {
  if (!hasPriceComponent(pricing)) {
    throw new ValidationError('You must specify at least one price component');
  }
}

/**
 * Price per m3 after the handler's modifier, never below zero.
 * The modifier only applies to pricings that opt into it.
 */
export function effectivePricePerVolume(
  pricing: Pick<PricingRow, 'price_per_volume' | 'use_price_per_volume_modifier'>,
  modifier: number | null
): number {
  const ppv = pricing.price_per_volume ?? 0;
  if (!pricing.use_price_per_volume_modifier || modifier === null) {
    return ppv;
  }
  return Math.max(0, ppv * (1 + modifier / 100));
}

export function calculatePrice(
  pricing: PriceComponents,
  volume: number,
  collateral: number,
  modifier: number | null = null
): number {
  if (volume < 0) throw new ValidationError('volume can not be negative');
  if (collateral < 0) throw new ValidationError('collateral can not be negative');
  assertPriceComponent(pricing);

  const base = pricing.price_base ?? 0;
  const min = pricing.price_min ?? 0;
  const ppc = pricing.price_per_collateral_percent ?? 0;

  return Math.max(
    min,
    base + volume * effectivePricePerVolume(pricing, modifier) + collateral * (ppc / 100)
  );
}

/** Every failed check; [] when the contract passes. */
export function getPriceCheckIssues(
  pricing: PriceCheckRules,
  volume: number,
  collateral: number,
  reward: number | null = null,
  modifier: number | null = null
): string[] {
  if (volume < 0) throw new ValidationError('volume can not be negative');
  if (collateral < 0) throw new ValidationError('collateral can not be negative');
  if (reward !== null && reward < 0) throw new ValidationError('reward can not be negative');
  assertPriceComponent(pricing);

  const issues: string[] = [];

  if (pricing.volume_min && volume < pricing.volume_min) {
    issues.push(`below the minimum required volume of ${formatThousandM3(pricing.volume_min)}`);
  }
  if (pricing.volume_max && volume > pricing.volume_max) {
    issues.push(`exceeds the maximum allowed volume of ${formatThousandM3(pricing.volume_max)}`);
  }
  if (pricing.collateral_max && collateral > pricing.collateral_max) {
    issues.push(
      `exceeds the maximum allowed collateral of ${formatMillionIsk(pricing.collateral_max)}`
    );
  }
  if (pricing.collateral_min && collateral < pricing.collateral_min) {
    issues.push(
      `below the minimum required collateral of ${formatMillionIsk(pricing.collateral_min)}`
    );
  }
  // A zero reward counts as no reward.
  if (reward) {
    const price = calculatePrice(pricing, volume, collateral, modifier);
    if (reward < price) {
      issues.push(`reward is below the calculated price of ${formatMillionIsk(price)}`);
    }
  }

  return issues;
}

export function requiresVolume(pricing: Pick<PricingRow, 'price_per_volume' | 'volume_min'>): boolean {
  return Boolean(pricing.price_per_volume || pricing.volume_min);
}

export function requiresCollateral(
  pricing: Pick<PricingRow, 'price_per_collateral_percent' | 'collateral_min'>
): boolean {
  return Boolean(pricing.price_per_collateral_percent || pricing.collateral_min);
}

/** Only a base price: same price for every shipment. */
export function isFixPrice(pricing: PriceComponents): boolean {
  return Boolean(
    pricing.price_base &&
      !pricing.price_min &&
      !pricing.price_per_volume &&
      !pricing.price_per_collateral_percent
  );
}

function routeKey(startLocationId: number, endLocationId: number): string {
  return `${startLocationId}x${endLocationId}`;
}

/**
 * Active pricings by directed route. Bidirectional pricings also cover the
 * reversed route; when several pricings claim a route the highest id wins.
 */
export function buildPricingLookup(pricings: PricingRow[]): Map<string, PricingRow> {
  const lookup = new Map<string, PricingRow>();
  const byIdAscending = pricings.filter((p) => p.is_active).sort((a, b) => a.id - b.id);

  for (const pricing of byIdAscending) {
    lookup.set(routeKey(pricing.start_location_id, pricing.end_location_id), pricing);
    if (pricing.is_bidirectional) {
      lookup.set(routeKey(pricing.end_location_id, pricing.start_location_id), pricing);
    }
  }
  return lookup;
}

export function findPricingForRoute(
  lookup: Map<string, PricingRow>,
  startLocationId: number,
  endLocationId: number
): PricingRow | null {
  return lookup.get(routeKey(startLocationId, endLocationId)) ?? null;
}

// ── Service ──

export class PricingService {
  constructor(
    private readonly pricingRepo: IPricingRepository,
    private readonly contractRepo: IContractRepository,
    private readonly handlerRepo: IContractHandlerRepository,
    private readonly locationRepo: ILocationRepository,
    private readonly queue: TaskQueue,
    private readonly log: ILogProvider
  ) {}

  /**
   * Assign the matching pricing and its issues to every contract that is
   * outstanding or has no pricing yet; clear both when no pricing matches.
   */
  async reconcile(handlerId?: number): Promise<ReconcileResult> {
    const handler =
      handlerId === undefined
        ? await this.handlerRepo.find()
        : await this.handlerRepo.findById(handlerId);
    const modifier = handler?.price_per_volume_modifier ?? null;

    const lookup = buildPricingLookup(await this.pricingRepo.findActive());
    const contracts = await this.contractRepo.find({
      ...(handler && { handlerId: handler.id }),
      outstandingOrUnpriced: true,
    });

    const result: ReconcileResult = { checked: contracts.length, matched: 0, cleared: 0 };

    for (const contract of contracts) {
      const pricing = findPricingForRoute(
        lookup,
        contract.start_location_id,
        contract.end_location_id
      );

      if (pricing) {
        const issues = this.issuesFor(contract, pricing, modifier);
        await this.contractRepo.updateAssignment(contract.id, pricing.id, issues);
        result.matched++;
      } else {
        if (contract.pricing_id !== null || contract.issues !== null) {
          result.cleared++;
        }
        await this.contractRepo.updateAssignment(contract.id, null, null);
      }
    }

    this.log.info(
      `Updated pricing for ${result.checked} contracts: ${result.matched} matched, ${result.cleared} cleared`
    );
    return result;
  }

  /** Active default pricing, else the active pricing with the lowest id. */
  async getDefault(): Promise<PricingRow | null> {
    const active = await this.pricingRepo.findActive();
    return active.find((p) => p.is_default) ?? active[0] ?? null;
  }

  /** The active pricing with this id, else the default pricing. */
  async getOrDefault(id?: number): Promise<PricingRow | null> {
    if (id !== undefined) {
      const pricing = await this.pricingRepo.findById(id);
      if (pricing?.is_active) return pricing;
    }
    return this.getDefault();
  }

  async getById(id: number): Promise<PricingRow> {
    const pricing = await this.pricingRepo.findById(id);
    if (!pricing) {
      throw new NotFoundError(`Pricing ${id} not found`);
    }
    return pricing;
  }

  async list(): Promise<PricingResponse[]> {
    const pricings = await this.pricingRepo.findAll();
    return Promise.all(pricings.map((p) => this.toResponse(p)));
  }

  async create(input: PricingInput): Promise<PricingResponse> {
    const row = toPricingInsert(input);
    await this.assertLocationsExist(row.start_location_id, row.end_location_id);

    const created = await this.pricingRepo.insert(row);
    if (created.is_default) {
      await this.pricingRepo.clearDefault(created.id);
    }

    this.log.info(`Created pricing ${created.id}`);
    this.pricingChanged();
    return this.toResponse(created);
  }

  async update(id: number, input: PricingInput): Promise<PricingResponse> {
    await this.getById(id);
    const row = toPricingInsert(input);
    await this.assertLocationsExist(row.start_location_id, row.end_location_id);

    const updated = await this.pricingRepo.update(id, row);
    if (updated.is_default) {
      await this.pricingRepo.clearDefault(updated.id);
    }

    this.log.info(`Updated pricing ${id}`);
    this.pricingChanged();
    return this.toResponse(updated);
  }

  async remove(id: number): Promise<void> {
    await this.getById(id);
    await this.pricingRepo.delete(id);

    this.log.info(`Deleted pricing ${id}`);
    this.pricingChanged();
  }

  async toResponse(pricing: PricingRow): Promise<PricingResponse> {
    const [start, end] = await Promise.all([
      this.locationRepo.findById(pricing.start_location_id),
      this.locationRepo.findById(pricing.end_location_id),
    ]);

    return {
      id: pricing.id,
      name: routeName(start, end),
      startLocationId: pricing.start_location_id,
      endLocationId: pricing.end_location_id,
      isActive: pricing.is_active,
      isBidirectional: pricing.is_bidirectional,
      isDefault: pricing.is_default,
      priceBase: pricing.price_base,
      priceMin: pricing.price_min,
      pricePerVolume: pricing.price_per_volume,
      usePricePerVolumeModifier: pricing.use_price_per_volume_modifier,
      pricePerCollateralPercent: pricing.price_per_collateral_percent,
      collateralMin: pricing.collateral_min,
      collateralMax: pricing.collateral_max,
      volumeMin: pricing.volume_min,
      volumeMax: pricing.volume_max,
      daysToExpire: pricing.days_to_expire,
      daysToComplete: pricing.days_to_complete,
      details: pricing.details,
      requiresVolume: requiresVolume(pricing),
      requiresCollateral: requiresCollateral(pricing),
      isFixPrice: isFixPrice(pricing),
    };
  }

  // ── Private ──

  /** Every change to pricings re-matches all contracts. */
  private pricingChanged(): void {
    this.queue.enqueue(CONTRACTS_QUEUE, 'pricing-changed', () => this.reconcile());
  }

  private issuesFor(contract: ContractRow, pricing: PricingRow, modifier: number | null): string[] | null {
    try {
      return getPriceCheckIssues(pricing, contract.volume, contract.collateral, contract.reward, modifier);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.log.warn(`Contract ${contract.contract_id}: price check skipped: ${err.message}`);
      return null;
    }
  }

  private async assertLocationsExist(startId: number, endId: number): Promise<void> {
    const found = await this.locationRepo.findByIds([startId, endId]);
    for (const id of [startId, endId]) {
      if (!found.some((l) => l.id === id)) {
        throw new ValidationError(`Unknown location ${id}. Add it first.`, { locationId: id });
      }
    }
  }
}

export function toPricingInsert(input: PricingInput): PricingInsert {
  const row: PricingInsert = {
    start_location_id: input.startLocationId,
    end_location_id: input.endLocationId,
    is_active: input.isActive ?? true,
    is_bidirectional: input.isBidirectional ?? true,
    is_default: input.isDefault ?? false,
    price_base: input.priceBase ?? null,
    price_min: input.priceMin ?? null,
    price_per_volume: input.pricePerVolume ?? null,
    use_price_per_volume_modifier: input.usePricePerVolumeModifier ?? false,
    price_per_collateral_percent: input.pricePerCollateralPercent ?? null,
    collateral_min: input.collateralMin ?? null,
    collateral_max: input.collateralMax ?? null,
    volume_min: input.volumeMin ?? null,
    volume_max: input.volumeMax ?? null,
    days_to_expire: input.daysToExpire ?? null,
    days_to_complete: input.daysToComplete ?? null,
    details: input.details ?? null,
  };

  const numeric: Array<[string, number | null]> = [
    ['priceBase', row.price_base],
    ['priceMin', row.price_min],
    ['pricePerVolume', row.price_per_volume],
    ['pricePerCollateralPercent', row.price_per_collateral_percent],
    ['collateralMin', row.collateral_min],
    ['collateralMax', row.collateral_max],
    ['volumeMin', row.volume_min],
    ['volumeMax', row.volume_max],
    ['daysToExpire', row.days_to_expire],
    ['daysToComplete', row.days_to_complete],
  ];
  for (const [field, value] of numeric) {
    if (value !== null && value < 0) {
      throw new ValidationError(`${field} can not be negative`);
    }
  }

  assertPriceComponent(row);
  return row;
}
