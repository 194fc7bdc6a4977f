/**
 * Contract data access interface.
 * Synced columns and locally owned columns (pricing_id, issues,
 * date_notified) are written through separate methods.
 */

import type { ContractRow, ContractSyncedFields } from '../types/database.js';
import type { ContractStatus } from '../types/models.js';

export interface ContractFilter {
  handlerId?: number;
  statuses?: readonly ContractStatus[];
  /** true: pricing_id is set, false: pricing_id is null. */
  hasPricing?: boolean;
  /** Only contracts that are outstanding or have no pricing. */
  outstandingOrUnpriced?: boolean;
  /** Only contracts with date_notified unset. */
  unnotified?: boolean;
  /** Only contracts whose date_expired is after this ISO timestamp. */
  expiresAfter?: string;
}

export interface IContractRepository {
  findById(id: number): Promise<ContractRow | null>;

  findByContractId(handlerId: number, contractId: number): Promise<ContractRow | null>;

  /** Ordered by date_issued ascending. */
  find(filter?: ContractFilter): Promise<ContractRow[]>;

  /** New row with pricing_id, issues and date_notified unset. */
  insert(fields: ContractSyncedFields): Promise<ContractRow>;

  /** Overwrite synced columns only. */
  updateSynced(id: number, fields: ContractSyncedFields): Promise<ContractRow>;

  /** Pricing reconciliation result. Both null clears the assignment. */
  updateAssignment(id: number, pricingId: number | null, issues: string[] | null): Promise<void>;

  markNotified(id: number, at: string): Promise<void>;

  /** Remove every contract of the handler. Returns the deleted row ids. */
  deleteByHandler(handlerId: number): Promise<number[]>;
}
