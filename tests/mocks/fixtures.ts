/**
 * Shared test data: one alliance running a freight service between Jita
 * and Amarr, a customer, and a pilot who hauls for the alliance.
 */

import type { ContractHandlerRow, ContractRow, EsiTokenRow, LocationRow, PricingRow } from '../../src/types/database.js';
import type { EsiContract } from '../../src/types/esi.js';
import { SYNC_SCOPES } from '../../src/services/ContractSyncService.js';
import type { MockEsiClient } from './MockEsiClient.js';

export const ALLIANCE_ID = 99000001;
export const ALLIANCE_NAME = 'Test Alliance';
export const CORPORATION_ID = 98000001;
export const CORPORATION_NAME = 'Test Haulers';
export const SYNC_CHARACTER_ID = 90000001;
export const SYNC_CHARACTER_NAME = 'Sync Character';

export const PILOT_ID = 90000020;
export const PILOT_NAME = 'Pilot Two';

export const CUSTOMER_ID = 90000010;
export const CUSTOMER_NAME = 'Customer One';
export const CUSTOMER_CORPORATION_ID = 98000010;
export const CUSTOMER_CORPORATION_NAME = 'Customer Corp';

export const JITA_ID = 60003760;
export const JITA_NAME = 'Jita IV - Moon 4 - Caldari Navy Assembly Plant';
export const AMARR_ID = 60008494;
export const AMARR_NAME = 'Amarr VIII (Oris) - Emperor Family Academy';
export const STRUCTURE_ID = 1022734985679;
export const STRUCTURE_NAME = 'Perimeter - Test Tower';

export const CONTRACT_ID = 149409005;

/** Fixed clock for notification tests: a day after the default contract was issued. */
export const NOW = Date.parse('2026-03-02T10:00:00Z');

export function seedEsi(esi: MockEsiClient): void {
  esi.addAlliance(ALLIANCE_ID, ALLIANCE_NAME);
  esi.addCorporation(CORPORATION_ID, CORPORATION_NAME, 'THLR', ALLIANCE_ID);
  esi.addCharacter(SYNC_CHARACTER_ID, SYNC_CHARACTER_NAME, CORPORATION_ID, ALLIANCE_ID);
  esi.addCharacter(PILOT_ID, PILOT_NAME, CORPORATION_ID, ALLIANCE_ID);
  esi.addCorporation(CUSTOMER_CORPORATION_ID, CUSTOMER_CORPORATION_NAME, 'CUST');
  esi.addCharacter(CUSTOMER_ID, CUSTOMER_NAME, CUSTOMER_CORPORATION_ID);
  esi.addStation(JITA_ID, JITA_NAME, 30000142);
  esi.addStation(AMARR_ID, AMARR_NAME, 30002187);
  esi.addStructure(STRUCTURE_ID, STRUCTURE_NAME, 30000144);
}

export function syncToken(overrides: Partial<EsiTokenRow> = {}): EsiTokenRow {
  return {
    character_id: SYNC_CHARACTER_ID,
    access_token: 'test-token',
    scopes: [...SYNC_SCOPES],
    expires_at: '2099-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeHandler(overrides: Partial<ContractHandlerRow> = {}): ContractHandlerRow {
  return {
    id: 1,
    organization_id: ALLIANCE_ID,
    organization_name: ALLIANCE_NAME,
    organization_category: 'alliance',
    operation_mode: 'my_alliance',
    character_id: SYNC_CHARACTER_ID,
    character_corporation_id: CORPORATION_ID,
    owner_user_id: null,
    price_per_volume_modifier: null,
    version_hash: null,
    last_sync: null,
    last_error: 'NONE',
    created_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeEsiContract(overrides: Partial<EsiContract> = {}): EsiContract {
  return {
    contract_id: CONTRACT_ID,
    acceptor_id: 0,
    assignee_id: ALLIANCE_ID,
    availability: 'personal',
    collateral: 50_000_000,
    date_expired: '2026-03-15T10:00:00Z',
    date_issued: '2026-03-01T10:00:00Z',
    days_to_complete: 3,
    end_location_id: AMARR_ID,
    for_corporation: false,
    issuer_corporation_id: CUSTOMER_CORPORATION_ID,
    issuer_id: CUSTOMER_ID,
    reward: 20_000_000,
    start_location_id: JITA_ID,
    status: 'outstanding',
    title: 'Minerals',
    type: 'courier',
    volume: 10_000,
    ...overrides,
  };
}

export function makeContract(overrides: Partial<ContractRow> = {}): ContractRow {
  return {
    id: 1,
    handler_id: 1,
    contract_id: CONTRACT_ID,
    status: 'outstanding',
    issuer_id: CUSTOMER_ID,
    issuer_corporation_id: CUSTOMER_CORPORATION_ID,
    acceptor_id: null,
    acceptor_corporation_id: null,
    start_location_id: JITA_ID,
    end_location_id: AMARR_ID,
    collateral: 50_000_000,
    reward: 20_000_000,
    volume: 10_000,
    days_to_complete: 3,
    for_corporation: false,
    title: 'Minerals',
    date_issued: '2026-03-01T10:00:00.000Z',
    date_accepted: null,
    date_completed: null,
    date_expired: '2026-03-15T10:00:00.000Z',
    pricing_id: null,
    issues: null,
    date_notified: null,
    updated_at: '2026-03-01T10:00:00.000Z',
    ...overrides,
  };
}

export function makePricing(overrides: Partial<PricingRow> = {}): PricingRow {
  return {
    id: 1,
    start_location_id: JITA_ID,
    end_location_id: AMARR_ID,
    is_active: true,
    is_bidirectional: true,
    is_default: false,
    price_base: null,
    price_min: null,
    price_per_volume: 1_000,
    use_price_per_volume_modifier: false,
    price_per_collateral_percent: null,
    collateral_min: null,
    collateral_max: null,
    volume_min: null,
    volume_max: null,
    days_to_expire: 14,
    days_to_complete: 3,
    details: null,
    created_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function jita(): LocationRow {
  return { id: JITA_ID, name: JITA_NAME, solar_system_id: 30000142, type_id: 1529, category: 'station' };
}

export function amarr(): LocationRow {
  return { id: AMARR_ID, name: AMARR_NAME, solar_system_id: 30002187, type_id: 1529, category: 'station' };
}
