/**
 * Supabase implementation of IEveEntityRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEveEntityRepository } from './IEveEntityRepository.js';
import type { EveEntityRow } from '../types/database.js';

export class SupabaseEveEntityRepository implements IEveEntityRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: number): Promise<EveEntityRow | null> {
    const { data, error } = await this.db
      .from('eve_entities')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find entity: ${error.message}`);
    return data as EveEntityRow | null;
  }

  async findByIds(ids: number[]): Promise<EveEntityRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db.from('eve_entities').select('*').in('id', ids);

    if (error) throw new Error(`Failed to find entities: ${error.message}`);
    return (data ?? []) as EveEntityRow[];
  }

  async upsert(row: EveEntityRow): Promise<EveEntityRow> {
    const { data, error } = await this.db
      .from('eve_entities')
      .upsert(row, { onConflict: 'id' })
      .select()
      .single();

    if (error) throw new Error(`Failed to upsert entity: ${error.message}`);
    return data as EveEntityRow;
  }
}
