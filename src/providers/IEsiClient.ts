/**
 * EVE Swagger Interface client.
 * Transient upstream failures are retried inside the client; anything that
 * still fails is thrown as an EsiError.
 */

import type {
  EsiCharacter,
  EsiContract,
  EsiCorporation,
  EsiName,
  EsiStation,
  EsiStructure,
} from '../types/esi.js';

export interface IEsiClient {
  /** All pages of a corporation's contracts, in the order ESI returned them. */
  getCorporationContracts(corporationId: number, token: string): Promise<EsiContract[]>;

  getStation(stationId: number): Promise<EsiStation>;

  /** Requires a token with esi-universe.read_structures.v1 and docking access. */
  getStructure(structureId: number, token: string): Promise<EsiStructure>;

  resolveNames(ids: number[]): Promise<EsiName[]>;

  getCharacter(characterId: number): Promise<EsiCharacter>;

  getCorporation(corporationId: number): Promise<EsiCorporation>;
}
