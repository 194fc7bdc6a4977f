/**
 * Mock ESI client for testing.
 * Serves contracts, stations, structures and names from in-memory tables
 * and counts calls per method.
 */

import { EsiError } from '../../src/errors.js';
import type { IEsiClient } from '../../src/providers/IEsiClient.js';
import type {
  EsiCharacter,
  EsiContract,
  EsiCorporation,
  EsiName,
  EsiStation,
  EsiStructure,
} from '../../src/types/esi.js';

export class MockEsiClient implements IEsiClient {
  contracts: EsiContract[] = [];
  readonly stations = new Map<number, EsiStation>();
  readonly structures = new Map<number, EsiStructure>();
  readonly names = new Map<number, EsiName>();
  readonly characters = new Map<number, EsiCharacter>();
  readonly corporations = new Map<number, EsiCorporation>();

  /** Thrown by getCorporationContracts when set. */
  contractsError: Error | null = null;
  /** Structure ids that answer with 403. */
  readonly forbiddenStructures = new Set<number>();

  readonly calls: Record<keyof IEsiClient, number> = {
    getCorporationContracts: 0,
    getStation: 0,
    getStructure: 0,
    resolveNames: 0,
    getCharacter: 0,
    getCorporation: 0,
  };

  async getCorporationContracts(_corporationId: number, _token: string): Promise<EsiContract[]> {
    this.calls.getCorporationContracts++;
    if (this.contractsError) throw this.contractsError;
    return this.contracts.map((c) => ({ ...c }));
  }

  async getStation(stationId: number): Promise<EsiStation> {
    this.calls.getStation++;
    return this.lookup(this.stations, stationId, `/universe/stations/${stationId}/`);
  }

  async getStructure(structureId: number, _token: string): Promise<EsiStructure> {
    this.calls.getStructure++;
    const path = `/universe/structures/${structureId}/`;
    if (this.forbiddenStructures.has(structureId)) {
      throw new EsiError(403, path, 'Forbidden');
    }
    return this.lookup(this.structures, structureId, path);
  }

  async resolveNames(ids: number[]): Promise<EsiName[]> {
    this.calls.resolveNames++;
    const missing = ids.filter((id) => !this.names.has(id));
    if (missing.length > 0) {
      throw new EsiError(404, '/universe/names/', `Ensure all IDs are valid: ${missing.join(', ')}`);
    }
    return ids.flatMap((id) => this.names.get(id) ?? []);
  }

  async getCharacter(characterId: number): Promise<EsiCharacter> {
    this.calls.getCharacter++;
    return this.lookup(this.characters, characterId, `/characters/${characterId}/`);
  }

  async getCorporation(corporationId: number): Promise<EsiCorporation> {
    this.calls.getCorporation++;
    return this.lookup(this.corporations, corporationId, `/corporations/${corporationId}/`);
  }

  // ── Test Helpers ──

  addCharacter(id: number, name: string, corporationId: number, allianceId?: number): void {
    this.names.set(id, { id, name, category: 'character' });
    this.characters.set(id, {
      name,
      corporation_id: corporationId,
      ...(allianceId !== undefined && { alliance_id: allianceId }),
    });
  }

  addCorporation(id: number, name: string, ticker: string, allianceId?: number): void {
    this.names.set(id, { id, name, category: 'corporation' });
    this.corporations.set(id, {
      name,
      ticker,
      ...(allianceId !== undefined && { alliance_id: allianceId }),
    });
  }

  addAlliance(id: number, name: string): void {
    this.names.set(id, { id, name, category: 'alliance' });
  }

  addStation(id: number, name: string, systemId: number): void {
    this.stations.set(id, { station_id: id, name, system_id: systemId, type_id: 1529 });
  }

  addStructure(id: number, name: string, systemId: number): void {
    this.structures.set(id, { name, owner_id: 1, solar_system_id: systemId, type_id: 35834 });
  }

  totalCalls(): number {
    return Object.values(this.calls).reduce((sum, n) => sum + n, 0);
  }

  private lookup<T>(table: Map<number, T>, id: number, path: string): T {
    const value = table.get(id);
    if (!value) throw new EsiError(404, path, 'Not found');
    return value;
  }
}
