/**
 * Customer notification log: one row per (contract, status) announced.
 */

import type { CustomerNotificationRow } from '../types/database.js';
import type { ContractStatus } from '../types/models.js';

export interface ICustomerNotificationRepository {
  exists(contractPk: number, status: ContractStatus): Promise<boolean>;

  /** Insert or refresh date_notified for (contractPk, status). */
  record(contractPk: number, status: ContractStatus, at: string): Promise<CustomerNotificationRow>;

  deleteForContracts(contractPks: number[]): Promise<void>;
}
