/**
 * Supabase implementation of ILocationRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ILocationRepository } from './ILocationRepository.js';
import type { LocationRow } from '../types/database.js';

export class SupabaseLocationRepository implements ILocationRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: number): Promise<LocationRow | null> {
    const { data, error } = await this.db
      .from('locations')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find location: ${error.message}`);
    return data as LocationRow | null;
  }

  async findByIds(ids: number[]): Promise<LocationRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db.from('locations').select('*').in('id', ids);

    if (error) throw new Error(`Failed to find locations: ${error.message}`);
    return (data ?? []) as LocationRow[];
  }

  async upsert(row: LocationRow): Promise<LocationRow> {
    const { data, error } = await this.db
      .from('locations')
      .upsert(row, { onConflict: 'id' })
      .select()
      .single();

    if (error) throw new Error(`Failed to upsert location: ${error.message}`);
    return data as LocationRow;
  }
}
