/**
 * Supabase implementation of IContractHandlerRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IContractHandlerRepository } from './IContractHandlerRepository.js';
import type { ContractHandlerInsert, ContractHandlerRow } from '../types/database.js';

export class SupabaseContractHandlerRepository implements IContractHandlerRepository {
  constructor(private readonly db: SupabaseClient) {}

  async find(): Promise<ContractHandlerRow | null> {
    const { data, error } = await this.db
      .from('contract_handlers')
      .select('*')
      .order('id', { ascending: true })
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to find contract handler: ${error.message}`);
    return data as ContractHandlerRow | null;
  }

  async findById(id: number): Promise<ContractHandlerRow | null> {
    const { data, error } = await this.db
      .from('contract_handlers')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find contract handler: ${error.message}`);
    return data as ContractHandlerRow | null;
  }

  async insert(row: ContractHandlerInsert): Promise<ContractHandlerRow> {
    const { data, error } = await this.db
      .from('contract_handlers')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert contract handler: ${error.message}`);
    return data as ContractHandlerRow;
  }

  async update(id: number, data: Partial<ContractHandlerInsert>): Promise<ContractHandlerRow> {
    const { data: updated, error } = await this.db
      .from('contract_handlers')
      .update(data)
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update contract handler: ${error.message}`);
    return updated as ContractHandlerRow;
  }
}
