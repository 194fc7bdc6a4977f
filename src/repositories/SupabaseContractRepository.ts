/**
 * Supabase implementation of IContractRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ContractFilter, IContractRepository } from './IContractRepository.js';
import type { ContractRow, ContractSyncedFields } from '../types/database.js';

export class SupabaseContractRepository implements IContractRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: number): Promise<ContractRow | null> {
    const { data, error } = await this.db
      .from('contracts')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find contract: ${error.message}`);
    return data as ContractRow | null;
  }

  async findByContractId(handlerId: number, contractId: number): Promise<ContractRow | null> {
    const { data, error } = await this.db
      .from('contracts')
      .select('*')
      .eq('handler_id', handlerId)
      .eq('contract_id', contractId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find contract: ${error.message}`);
    return data as ContractRow | null;
  }

  async find(filter: ContractFilter = {}): Promise<ContractRow[]> {
    let query = this.db.from('contracts').select('*');

    if (filter.handlerId !== undefined) query = query.eq('handler_id', filter.handlerId);
    if (filter.statuses) query = query.in('status', [...filter.statuses]);
    if (filter.hasPricing === true) query = query.not('pricing_id', 'is', null);
    if (filter.hasPricing === false) query = query.is('pricing_id', null);
    if (filter.outstandingOrUnpriced) query = query.or('status.eq.outstanding,pricing_id.is.null');
    if (filter.unnotified) query = query.is('date_notified', null);
    if (filter.expiresAfter) query = query.gt('date_expired', filter.expiresAfter);

    const { data, error } = await query.order('date_issued', { ascending: true });

    if (error) throw new Error(`Failed to list contracts: ${error.message}`);
    return (data ?? []) as ContractRow[];
  }

  async insert(fields: ContractSyncedFields): Promise<ContractRow> {
    const { data, error } = await this.db
      .from('contracts')
      .insert({
        ...fields,
        pricing_id: null,
        issues: null,
        date_notified: null,
        updated_at: new Date().toISOString(),
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert contract: ${error.message}`);
    return data as ContractRow;
  }

  async updateSynced(id: number, fields: ContractSyncedFields): Promise<ContractRow> {
    const { data, error } = await this.db
      .from('contracts')
      .update({ ...fields, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update contract: ${error.message}`);
    return data as ContractRow;
  }

  async updateAssignment(
    id: number,
    pricingId: number | null,
    issues: string[] | null
  ): Promise<void> {
    const { error } = await this.db
      .from('contracts')
      .update({ pricing_id: pricingId, issues })
      .eq('id', id);

    if (error) throw new Error(`Failed to update contract pricing: ${error.message}`);
  }

  async markNotified(id: number, at: string): Promise<void> {
    const { error } = await this.db
      .from('contracts')
      .update({ date_notified: at })
      .eq('id', id);

    if (error) throw new Error(`Failed to mark contract notified: ${error.message}`);
  }

  async deleteByHandler(handlerId: number): Promise<number[]> {
    const { data, error } = await this.db
      .from('contracts')
      .delete()
      .eq('handler_id', handlerId)
      .select('id');

    if (error) throw new Error(`Failed to delete contracts: ${error.message}`);
    return ((data ?? []) as Pick<ContractRow, 'id'>[]).map((row) => row.id);
  }
}
