/**
 * API types: shapes for request/response payloads.
 * Decoupled from database rows so the API can evolve independently.
 */

import type {
  ContractStatus,
  OperationMode,
  OrganizationCategory,
  SyncErrorCode,
} from './models.js';

// ── Requests ──

export interface CalculatorRequest {
  /** Falls back to the default pricing when omitted. */
  pricingId?: number;
  /** Cargo volume in thousands of m3. */
  volume?: number;
  /** Collateral in millions of ISK. */
  collateral?: number;
}

export interface PricingInput {
  startLocationId: number;
  endLocationId: number;
  isActive?: boolean;
  isBidirectional?: boolean;
  isDefault?: boolean;
  priceBase?: number | null;
  priceMin?: number | null;
  pricePerVolume?: number | null;
  usePricePerVolumeModifier?: boolean;
  pricePerCollateralPercent?: number | null;
  collateralMin?: number | null;
  collateralMax?: number | null;
  volumeMin?: number | null;
  volumeMax?: number | null;
  daysToExpire?: number | null;
  daysToComplete?: number | null;
  details?: string | null;
}

export interface SetupHandlerRequest {
  characterId: number;
  ownerUserId?: string;
  pricePerVolumeModifier?: number | null;
}

export interface SyncRequest {
  force?: boolean;
}

export interface SendNotificationsRequest {
  force?: boolean;
}

// ── Responses ──

export interface CalculatorResponse {
  pricingId: number;
  route: string;
  /** ISK */
  price: number;
  /** m3 */
  volume: number;
  /** ISK */
  collateral: number;
  issues: string[];
  daysToExpire: number | null;
  daysToComplete: number | null;
  details: string | null;
}

export interface PricingResponse extends Required<PricingInput> {
  id: number;
  name: string;
  requiresVolume: boolean;
  requiresCollateral: boolean;
  isFixPrice: boolean;
}

export interface HandlerStatusResponse {
  organizationId: number;
  organizationName: string;
  organizationCategory: OrganizationCategory;
  operationMode: OperationMode;
  operationModeFriendly: string;
  availability: string;
  characterId: number | null;
  pricePerVolumeModifier: number | null;
  lastSync: string | null;
  lastError: SyncErrorCode;
  lastErrorMessage: string;
  isSyncOk: boolean;
}

export interface ContractResponse {
  contractId: number;
  status: ContractStatus;
  route: string;
  startLocation: string;
  endLocation: string;
  issuer: string;
  acceptor: string | null;
  reward: number;
  collateral: number;
  volume: number;
  dateIssued: string;
  dateExpired: string;
  dateAccepted: string | null;
  dateCompleted: string | null;
  pricingId: number | null;
  /** null = not checked, [] = passed */
  issues: string[] | null;
  dateNotified: string | null;
}

export interface RouteStatistics {
  pricingId: number;
  route: string;
  contracts: number;
  rewards: number;
  collaterals: number;
  volume: number;
  pilots: number;
  customers: number;
}

export interface PartyStatistics {
  id: number;
  name: string;
  contracts: number;
  rewards: number;
  collaterals: number;
  volume: number;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
