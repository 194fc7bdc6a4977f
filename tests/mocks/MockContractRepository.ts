/**
 * In-memory mock for IContractRepository.
 * Enforces the unique (handler_id, contract_id) key.
 */

import type { ContractFilter, IContractRepository } from '../../src/repositories/IContractRepository.js';
import type { ContractRow, ContractSyncedFields } from '../../src/types/database.js';

export class MockContractRepository implements IContractRepository {
  private contracts = new Map<number, ContractRow>();
  private nextId = 1;

  async findById(id: number): Promise<ContractRow | null> {
    return this.contracts.get(id) ?? null;
  }

  async findByContractId(handlerId: number, contractId: number): Promise<ContractRow | null> {
    for (const contract of this.contracts.values()) {
      if (contract.handler_id === handlerId && contract.contract_id === contractId) {
        return contract;
      }
    }
    return null;
  }

  async find(filter: ContractFilter = {}): Promise<ContractRow[]> {
    return [...this.contracts.values()]
      .filter((c) => filter.handlerId === undefined || c.handler_id === filter.handlerId)
      .filter((c) => !filter.statuses || filter.statuses.includes(c.status))
      .filter((c) => filter.hasPricing === undefined || (c.pricing_id !== null) === filter.hasPricing)
      .filter((c) => !filter.outstandingOrUnpriced || c.status === 'outstanding' || c.pricing_id === null)
      .filter((c) => !filter.unnotified || c.date_notified === null)
      .filter((c) => !filter.expiresAfter || Date.parse(c.date_expired) > Date.parse(filter.expiresAfter))
      .sort((a, b) => Date.parse(a.date_issued) - Date.parse(b.date_issued));
  }

  async insert(fields: ContractSyncedFields): Promise<ContractRow> {
    if (await this.findByContractId(fields.handler_id, fields.contract_id)) {
      throw new Error(`Contract ${fields.contract_id} already exists`);
    }

    const full: ContractRow = {
      ...fields,
      id: this.nextId++,
      pricing_id: null,
      issues: null,
      date_notified: null,
      updated_at: new Date().toISOString(),
    };
    this.contracts.set(full.id, full);
    return { ...full };
  }

  async updateSynced(id: number, fields: ContractSyncedFields): Promise<ContractRow> {
    const existing = this.getOrThrow(id);
    const updated: ContractRow = { ...existing, ...fields, updated_at: new Date().toISOString() };
    this.contracts.set(id, updated);
    return { ...updated };
  }

  async updateAssignment(
    id: number,
    pricingId: number | null,
    issues: string[] | null
  ): Promise<void> {
    const existing = this.getOrThrow(id);
    this.contracts.set(id, { ...existing, pricing_id: pricingId, issues });
  }

  async markNotified(id: number, at: string): Promise<void> {
    const existing = this.getOrThrow(id);
    this.contracts.set(id, { ...existing, date_notified: at });
  }

  async deleteByHandler(handlerId: number): Promise<number[]> {
    const deleted = [...this.contracts.values()].filter((c) => c.handler_id === handlerId).map((c) => c.id);
    for (const id of deleted) this.contracts.delete(id);
    return deleted;
  }

  private getOrThrow(id: number): ContractRow {
    const existing = this.contracts.get(id);
    if (!existing) {
      throw new Error(`Contract row ${id} not found`);
    }
    return existing;
  }

  // ── Test Helpers ──

  /** Seed or overwrite a row directly, bypassing the column split. */
  put(row: ContractRow): void {
    this.contracts.set(row.id, { ...row });
    this.nextId = Math.max(this.nextId, row.id + 1);
  }

  clear(): void {
    this.contracts.clear();
    this.nextId = 1;
  }

  getAll(): ContractRow[] {
    return [...this.contracts.values()].sort((a, b) => a.id - b.id);
  }
}
