/**
 * Read access to synced contracts for the API.
 */

import type { IContractRepository } from '../repositories/IContractRepository.js';
import type { IEveEntityRepository } from '../repositories/IEveEntityRepository.js';
import type { ILocationRepository } from '../repositories/ILocationRepository.js';
import type { ContractResponse } from '../types/api.js';
import type { ContractStatus } from '../types/models.js';
import { routeName } from '../utils/format.js';

export const CONTRACT_LIST_CATEGORIES = ['active', 'all'] as const;
export type ContractListCategory = (typeof CONTRACT_LIST_CATEGORIES)[number];

export function isContractListCategory(value: string): value is ContractListCategory {
  return (CONTRACT_LIST_CATEGORIES as readonly string[]).includes(value);
}

const ACTIVE_STATUSES: readonly ContractStatus[] = ['outstanding', 'in_progress'];

export class ContractService {
  constructor(
    private readonly contractRepo: IContractRepository,
    private readonly entityRepo: IEveEntityRepository,
    private readonly locationRepo: ILocationRepository
  ) {}

  async list(category: ContractListCategory = 'active'): Promise<ContractResponse[]> {
    const contracts = await this.contractRepo.find(
      category === 'active' ? { statuses: ACTIVE_STATUSES } : {}
    );

    const [entities, locations] = await Promise.all([
      this.entityRepo.findByIds([
        ...new Set(
          contracts.flatMap((c) => (c.acceptor_id === null ? [c.issuer_id] : [c.issuer_id, c.acceptor_id]))
        ),
      ]),
      this.locationRepo.findByIds([
        ...new Set(contracts.flatMap((c) => [c.start_location_id, c.end_location_id])),
      ]),
    ]);
    const entityById = new Map(entities.map((e) => [e.id, e]));
    const locationById = new Map(locations.map((l) => [l.id, l]));

    return contracts.map((c) => {
      const start = locationById.get(c.start_location_id);
      const end = locationById.get(c.end_location_id);
      return {
        contractId: c.contract_id,
        status: c.status,
        route: routeName(start, end),
        startLocation: start?.name ?? String(c.start_location_id),
        endLocation: end?.name ?? String(c.end_location_id),
        issuer: entityById.get(c.issuer_id)?.name ?? String(c.issuer_id),
        acceptor: c.acceptor_id === null ? null : (entityById.get(c.acceptor_id)?.name ?? String(c.acceptor_id)),
        reward: c.reward,
        collateral: c.collateral,
        volume: c.volume,
        dateIssued: c.date_issued,
        dateExpired: c.date_expired,
        dateAccepted: c.date_accepted,
        dateCompleted: c.date_completed,
        pricingId: c.pricing_id,
        issues: c.issues,
        dateNotified: c.date_notified,
      };
    });
  }
}
