/**
 * ESI response payloads (https://esi.evetech.net/latest).
 * Only the fields this service reads are typed.
 */

export type EsiContractType = 'unknown' | 'item_exchange' | 'auction' | 'courier' | 'loan';

export type EsiContractAvailability = 'public' | 'personal' | 'corporation' | 'alliance';

/** GET /corporations/{corporation_id}/contracts/ */
export interface EsiContract {
  contract_id: number;
  /** 0 while nobody accepted the contract. */
  acceptor_id: number;
  assignee_id: number;
  availability: EsiContractAvailability;
  collateral?: number;
  date_accepted?: string;
  date_completed?: string;
  date_expired: string;
  date_issued: string;
  days_to_complete?: number;
  end_location_id?: number;
  for_corporation: boolean;
  issuer_corporation_id: number;
  issuer_id: number;
  price?: number;
  reward?: number;
  start_location_id?: number;
  status: string;
  title?: string;
  type: EsiContractType;
  volume?: number;
}

/** GET /universe/stations/{station_id}/ */
export interface EsiStation {
  station_id: number;
  name: string;
  system_id: number;
  type_id: number;
}

/** GET /universe/structures/{structure_id}/ */
export interface EsiStructure {
  name: string;
  owner_id: number;
  solar_system_id: number;
  type_id?: number;
}

/** POST /universe/names/ */
export interface EsiName {
  id: number;
  name: string;
  category: string;
}

/** GET /characters/{character_id}/ */
export interface EsiCharacter {
  name: string;
  corporation_id: number;
  alliance_id?: number;
}

/** GET /corporations/{corporation_id}/ */
export interface EsiCorporation {
  name: string;
  ticker: string;
  alliance_id?: number;
}
