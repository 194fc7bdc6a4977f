/**
 * Entity resolver service.
 * Looks up locations and characters/corporations/alliances locally and
 * fetches them from ESI on a miss.
 */

import { EsiError } from '../errors.js';
import type { IEsiClient } from '../providers/IEsiClient.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IEveEntityRepository } from '../repositories/IEveEntityRepository.js';
import type { ILocationRepository } from '../repositories/ILocationRepository.js';
import type { EveEntityRow, LocationRow } from '../types/database.js';
import { isEntityCategory, isStationId, type FindOrCreateResult } from '../types/models.js';

export interface ResolveLocationOptions {
  /**
   * Store structures the token cannot see as "Unknown structure {id}"
   * instead of failing. Default: true.
   */
  addUnknown?: boolean;
}

export class EntityResolverService {
  constructor(
    private readonly esi: IEsiClient,
    private readonly locationRepo: ILocationRepository,
    private readonly entityRepo: IEveEntityRepository,
    private readonly log: ILogProvider
  ) {}

  async resolveLocation(
    locationId: number,
    token: string,
    opts: ResolveLocationOptions = {}
  ): Promise<FindOrCreateResult<LocationRow>> {
    const existing = await this.locationRepo.findById(locationId);
    if (existing) {
      return { status: 'found', record: existing };
    }

    const record = await this.fetchLocation(locationId, token, opts.addUnknown ?? true);
    return { status: 'created', record };
  }

  /** Always re-fetches from ESI. Access errors on structures propagate. */
  async refreshLocation(locationId: number, token: string): Promise<LocationRow> {
    return this.fetchLocation(locationId, token, false);
  }

  async resolveEntity(id: number): Promise<EveEntityRow> {
    const existing = await this.entityRepo.findById(id);
    if (existing) return existing;

    const [resolved] = (await this.esi.resolveNames([id])).filter((n) => n.id === id);
    if (!resolved) {
      throw new Error(`ESI returned no name for id ${id}`);
    }
    if (!isEntityCategory(resolved.category)) {
      throw new Error(`Entity ${id} has unsupported category "${resolved.category}"`);
    }

    const row: EveEntityRow = {
      id,
      name: resolved.name,
      category: resolved.category,
      corporation_id: null,
      alliance_id: null,
    };

    if (row.category === 'character') {
      const character = await this.esi.getCharacter(id);
      row.corporation_id = character.corporation_id;
      row.alliance_id = character.alliance_id ?? null;
    } else if (row.category === 'corporation') {
      const corporation = await this.esi.getCorporation(id);
      row.alliance_id = corporation.alliance_id ?? null;
    }

    return this.entityRepo.upsert(row);
  }

  private async fetchLocation(
    locationId: number,
    token: string,
    addUnknown: boolean
  ): Promise<LocationRow> {
    if (isStationId(locationId)) {
      const station = await this.esi.getStation(locationId);
      return this.locationRepo.upsert({
        id: locationId,
        name: station.name,
        solar_system_id: station.system_id,
        type_id: station.type_id,
        category: 'station',
      });
    }

    try {
      const structure = await this.esi.getStructure(locationId, token);
      return await this.locationRepo.upsert({
        id: locationId,
        name: structure.name,
        solar_system_id: structure.solar_system_id,
        type_id: structure.type_id ?? null,
        category: 'structure',
      });
    } catch (err) {
      if (!(err instanceof EsiError && err.isForbidden && addUnknown)) {
        throw err;
      }

      this.log.warn(`No access to structure ${locationId}, storing it as unknown`);
      return this.locationRepo.upsert({
        id: locationId,
        name: `Unknown structure ${locationId}`,
        solar_system_id: null,
        type_id: null,
        category: 'unknown',
      });
    }
  }
}
