/**
 * Domain models: enums, constants and value types shared by the services.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Contracts ──

export const CONTRACT_STATUSES = [
  'outstanding',
  'in_progress',
  'finished_issuer',
  'finished_contractor',
  'finished',
  'canceled',
  'rejected',
  'failed',
  'deleted',
  'reversed',
] as const;

export type ContractStatus = (typeof CONTRACT_STATUSES)[number];

/** Once reached, a contract is never expected to go back to an open state. */
export const TERMINAL_STATUSES: readonly ContractStatus[] = [
  'finished',
  'canceled',
  'rejected',
  'failed',
  'deleted',
  'reversed',
];

/** Statuses the customer audience hears about, once each. */
export const CUSTOMER_NOTIFICATION_STATUSES: readonly ContractStatus[] = [
  'outstanding',
  'in_progress',
  'finished',
  'failed',
];

export function isContractStatus(value: string): value is ContractStatus {
  return (CONTRACT_STATUSES as readonly string[]).includes(value);
}

export function isTerminalStatus(status: ContractStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ── Locations & entities ──

export type LocationCategory = 'station' | 'structure' | 'unknown';

export type EntityCategory =
  | 'alliance'
  | 'character'
  | 'constellation'
  | 'corporation'
  | 'faction'
  | 'inventory_type'
  | 'region'
  | 'solar_system'
  | 'station';

const ENTITY_CATEGORIES: readonly EntityCategory[] = [
  'alliance',
  'character',
  'constellation',
  'corporation',
  'faction',
  'inventory_type',
  'region',
  'solar_system',
  'station',
];

export function isEntityCategory(value: string): value is EntityCategory {
  return (ENTITY_CATEGORIES as readonly string[]).includes(value);
}

export type OrganizationCategory = Extract<EntityCategory, 'alliance' | 'corporation'>;

/** Station item ids; every other location id is a player structure. */
export const STATION_ID_START = 60_000_000;
export const STATION_ID_END = 69_999_999;

export function isStationId(locationId: number): boolean {
  return locationId >= STATION_ID_START && locationId <= STATION_ID_END;
}

// ── Operation modes ──

export const OPERATION_MODES = [
  'my_alliance',
  'my_corporation',
  'corp_in_alliance',
  'corp_public',
] as const;

export type OperationMode = (typeof OPERATION_MODES)[number];

export const OPERATION_MODE_LABELS: Record<OperationMode, string> = {
  my_alliance: 'My Alliance',
  my_corporation: 'My Corporation',
  corp_in_alliance: 'Corporation in my Alliance',
  corp_public: 'Corporation public',
};

export function isOperationMode(value: string): value is OperationMode {
  return (OPERATION_MODES as readonly string[]).includes(value);
}

/** The kind of organization a handler must point at for the given mode. */
export function organizationCategoryForMode(mode: OperationMode): OrganizationCategory {
  return mode === 'my_alliance' ? 'alliance' : 'corporation';
}

// ── Sync errors ──

export const SYNC_ERROR_CODES = [
  'NONE',
  'TOKEN_INVALID',
  'TOKEN_EXPIRED',
  'INSUFFICIENT_PERMISSIONS',
  'NO_CHARACTER',
  'UPSTREAM_UNAVAILABLE',
  'OPERATION_MODE_MISMATCH',
  'UNKNOWN',
] as const;

export type SyncErrorCode = (typeof SYNC_ERROR_CODES)[number];

export const SYNC_ERROR_MESSAGES: Record<SyncErrorCode, string> = {
  NONE: 'No error',
  TOKEN_INVALID: 'Invalid token',
  TOKEN_EXPIRED: 'Expired token',
  INSUFFICIENT_PERMISSIONS: 'Insufficient permissions',
  NO_CHARACTER: 'No character set for fetching contracts',
  UPSTREAM_UNAVAILABLE: 'ESI API is currently unavailable',
  OPERATION_MODE_MISMATCH:
    'Operation mode does not match the organization of this contract handler',
  UNKNOWN: 'Unknown error',
};

// ── Results ──

/** Outcome of a lookup that creates the record when it is missing. */
export type FindOrCreateResult<T> =
  | { status: 'found'; record: T }
  | { status: 'created'; record: T };

export interface SyncResult {
  /** True when contracts were written during this run. */
  changed: boolean;
  error: SyncErrorCode;
  /** Relevant contracts seen on ESI after filtering. */
  contractsCount: number;
  /** Contracts whose resolution or upsert failed. */
  failedCount: number;
}

export interface DispatchResult {
  ok: boolean;
  sent: number;
  failed: number;
}

export type NotificationAudience = 'operator' | 'customer';
