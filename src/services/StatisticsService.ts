/**
 * Totals over finished contracts completed within the statistics window.
 */

import type { IContractRepository } from '../repositories/IContractRepository.js';
import type { IEveEntityRepository } from '../repositories/IEveEntityRepository.js';
import type { ILocationRepository } from '../repositories/ILocationRepository.js';
import type { IPricingRepository } from '../repositories/IPricingRepository.js';
import type { PartyStatistics, RouteStatistics } from '../types/api.js';
import type { ContractRow } from '../types/database.js';
import { routeName } from '../utils/format.js';

const DAY_MS = 86_400_000;

interface Totals {
  contracts: number;
  rewards: number;
  collaterals: number;
  volume: number;
}

function addTo(totals: Totals, contract: ContractRow): void {
  totals.contracts++;
  totals.rewards += contract.reward;
  totals.collaterals += contract.collateral;
  totals.volume += contract.volume;
}

export class StatisticsService {
  constructor(
    private readonly contractRepo: IContractRepository,
    private readonly pricingRepo: IPricingRepository,
    private readonly entityRepo: IEveEntityRepository,
    private readonly locationRepo: ILocationRepository,
    private readonly config: { statisticsMaxDays: number }
  ) {}

  async routes(now: number = Date.now()): Promise<RouteStatistics[]> {
    const contracts = await this.finishedContracts(now);
    const byPricing = new Map<number, { totals: Totals; pilots: Set<number>; customers: Set<number> }>();

    for (const contract of contracts) {
      if (contract.pricing_id === null) continue;
      let entry = byPricing.get(contract.pricing_id);
      if (!entry) {
        entry = {
          totals: { contracts: 0, rewards: 0, collaterals: 0, volume: 0 },
          pilots: new Set(),
          customers: new Set(),
        };
        byPricing.set(contract.pricing_id, entry);
      }
      addTo(entry.totals, contract);
      if (contract.acceptor_id !== null) entry.pilots.add(contract.acceptor_id);
      entry.customers.add(contract.issuer_id);
    }

    const pricings = await this.pricingRepo.findAll();
    const locations = await this.locationRepo.findByIds(
      pricings.flatMap((p) => [p.start_location_id, p.end_location_id])
    );
    const locationById = new Map(locations.map((l) => [l.id, l]));

    return pricings.flatMap((pricing) => {
      const entry = byPricing.get(pricing.id);
      if (!entry) return [];
      return [
        {
          pricingId: pricing.id,
          route: routeName(
            locationById.get(pricing.start_location_id),
            locationById.get(pricing.end_location_id)
          ),
          ...entry.totals,
          pilots: entry.pilots.size,
          customers: entry.customers.size,
        },
      ];
    });
  }

  /** Per acceptor character. */
  async pilots(now: number = Date.now()): Promise<PartyStatistics[]> {
    return this.byParty(await this.finishedContracts(now), (c) => c.acceptor_id);
  }

  /** Per acceptor corporation. */
  async pilotCorporations(now: number = Date.now()): Promise<PartyStatistics[]> {
    return this.byParty(await this.finishedContracts(now), (c) => c.acceptor_corporation_id);
  }

  /** Per issuer character. */
  async customers(now: number = Date.now()): Promise<PartyStatistics[]> {
    return this.byParty(await this.finishedContracts(now), (c) => c.issuer_id);
  }

  // ── Private ──

  private async finishedContracts(now: number): Promise<ContractRow[]> {
    const cutoff = now - this.config.statisticsMaxDays * DAY_MS;
    const finished = await this.contractRepo.find({ statuses: ['finished'] });
    return finished.filter(
      (c) => c.date_completed !== null && Date.parse(c.date_completed) >= cutoff
    );
  }

  private async byParty(
    contracts: ContractRow[],
    partyOf: (contract: ContractRow) => number | null
  ): Promise<PartyStatistics[]> {
    const totalsById = new Map<number, Totals>();
    for (const contract of contracts) {
      const id = partyOf(contract);
      if (id === null) continue;
      let totals = totalsById.get(id);
      if (!totals) {
        totals = { contracts: 0, rewards: 0, collaterals: 0, volume: 0 };
        totalsById.set(id, totals);
      }
      addTo(totals, contract);
    }

    const entities = await this.entityRepo.findByIds([...totalsById.keys()]);
    const nameById = new Map(entities.map((e) => [e.id, e.name]));

    return [...totalsById.entries()]
      .map(([id, totals]) => ({ id, name: nameById.get(id) ?? String(id), ...totals }))
      .sort((a, b) => b.contracts - a.contracts || a.name.localeCompare(b.name));
  }
}
