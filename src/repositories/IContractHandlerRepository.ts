/**
 * Contract handler data access interface.
 * The service is single-tenant: at most one handler row exists.
 */

import type { ContractHandlerInsert, ContractHandlerRow } from '../types/database.js';

export interface IContractHandlerRepository {
  /** The handler, if one was set up. */
  find(): Promise<ContractHandlerRow | null>;

  findById(id: number): Promise<ContractHandlerRow | null>;

  insert(row: ContractHandlerInsert): Promise<ContractHandlerRow>;

  update(id: number, data: Partial<ContractHandlerInsert>): Promise<ContractHandlerRow>;
}
