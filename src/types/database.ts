/**
 * Database row types: mirror the Supabase table schemas in
 * supabase/migrations. Column names use snake_case to match PostgreSQL
 * conventions. Timestamps are ISO-8601 strings.
 */

import type {
  ContractStatus,
  EntityCategory,
  LocationCategory,
  OperationMode,
  OrganizationCategory,
  SyncErrorCode,
} from './models.js';

export interface LocationRow {
  /** ESI item id for stations, structure id for structures. */
  id: number;
  name: string;
  solar_system_id: number | null;
  type_id: number | null;
  category: LocationCategory;
}

export interface EveEntityRow {
  id: number;
  name: string;
  category: EntityCategory;
  /** Set for characters. */
  corporation_id: number | null;
  /** Set for characters and corporations that belong to an alliance. */
  alliance_id: number | null;
}

export interface PricingRow {
  id: number;
  start_location_id: number;
  end_location_id: number;
  is_active: boolean;
  is_bidirectional: boolean;
  is_default: boolean;
  price_base: number | null;
  price_min: number | null;
  price_per_volume: number | null;
  use_price_per_volume_modifier: boolean;
  price_per_collateral_percent: number | null;
  collateral_min: number | null;
  collateral_max: number | null;
  volume_min: number | null;
  volume_max: number | null;
  days_to_expire: number | null;
  days_to_complete: number | null;
  details: string | null;
  created_at: string;
}

export type PricingInsert = Omit<PricingRow, 'id' | 'created_at'>;

export interface ContractHandlerRow {
  id: number;
  organization_id: number;
  organization_name: string;
  organization_category: OrganizationCategory;
  operation_mode: OperationMode;
  /** Character whose token is used for syncing. */
  character_id: number | null;
  /** Corporation of the sync character; its contracts endpoint is polled. */
  character_corporation_id: number | null;
  owner_user_id: string | null;
  /** Percentage applied to price_per_volume of opted-in pricings. */
  price_per_volume_modifier: number | null;
  version_hash: string | null;
  last_sync: string | null;
  last_error: SyncErrorCode;
  created_at: string;
}

export type ContractHandlerInsert = Omit<ContractHandlerRow, 'id' | 'created_at'>;

export interface ContractRow {
  id: number;
  handler_id: number;
  contract_id: number;
  status: ContractStatus;
  issuer_id: number;
  issuer_corporation_id: number;
  acceptor_id: number | null;
  acceptor_corporation_id: number | null;
  start_location_id: number;
  end_location_id: number;
  collateral: number;
  reward: number;
  volume: number;
  days_to_complete: number;
  for_corporation: boolean;
  title: string | null;
  date_issued: string;
  date_accepted: string | null;
  date_completed: string | null;
  date_expired: string;
  // Owned by the pricing reconciliation and notification stages.
  pricing_id: number | null;
  issues: string[] | null;
  date_notified: string | null;
  updated_at: string;
}

/** Columns ESI is authoritative for; everything an upsert may overwrite. */
export type ContractSyncedFields = Omit<
  ContractRow,
  'id' | 'pricing_id' | 'issues' | 'date_notified' | 'updated_at'
>;

export interface CustomerNotificationRow {
  id: number;
  contract_pk: number;
  status: ContractStatus;
  date_notified: string;
}

export interface EsiTokenRow {
  character_id: number;
  access_token: string;
  scopes: string[];
  expires_at: string;
}
