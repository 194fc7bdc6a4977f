/**
 * Supabase implementation of IPricingRepository.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { ConflictError } from '../errors.js';
import type { IPricingRepository } from './IPricingRepository.js';
import type { PricingInsert, PricingRow } from '../types/database.js';

const UNIQUE_VIOLATION = '23505';

export class SupabasePricingRepository implements IPricingRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findAll(): Promise<PricingRow[]> {
    const { data, error } = await this.db
      .from('pricings')
      .select('*')
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to list pricings: ${error.message}`);
    return (data ?? []) as PricingRow[];
  }

  async findActive(): Promise<PricingRow[]> {
    const { data, error } = await this.db
      .from('pricings')
      .select('*')
      .eq('is_active', true)
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to list active pricings: ${error.message}`);
    return (data ?? []) as PricingRow[];
  }

  async findById(id: number): Promise<PricingRow | null> {
    const { data, error } = await this.db
      .from('pricings')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find pricing: ${error.message}`);
    return data as PricingRow | null;
  }

  async insert(row: PricingInsert): Promise<PricingRow> {
    const { data, error } = await this.db.from('pricings').insert(row).select().single();

    if (error) throw toRepositoryError('insert', error);
    return data as PricingRow;
  }

  async update(id: number, data: Partial<PricingInsert>): Promise<PricingRow> {
    const { data: updated, error } = await this.db
      .from('pricings')
      .update(data)
      .eq('id', id)
      .select()
      .single();

    if (error) throw toRepositoryError('update', error);
    return updated as PricingRow;
  }

  async delete(id: number): Promise<void> {
    const { error } = await this.db.from('pricings').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete pricing: ${error.message}`);
  }

  async clearDefault(exceptId: number): Promise<void> {
    const { error } = await this.db
      .from('pricings')
      .update({ is_default: false })
      .eq('is_default', true)
      .neq('id', exceptId);

    if (error) throw new Error(`Failed to clear default pricing: ${error.message}`);
  }
}

function toRepositoryError(action: string, error: PostgrestError): Error {
  if (error.code === UNIQUE_VIOLATION) {
    return new ConflictError('ROUTE_EXISTS', 'A pricing for this route already exists');
  }
  return new Error(`Failed to ${action} pricing: ${error.message}`);
}
