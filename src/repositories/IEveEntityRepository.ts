/**
 * EVE entity (character, corporation, alliance) data access interface.
 */

import type { EveEntityRow } from '../types/database.js';

export interface IEveEntityRepository {
  findById(id: number): Promise<EveEntityRow | null>;

  findByIds(ids: number[]): Promise<EveEntityRow[]>;

  /** Insert or replace by id. */
  upsert(row: EveEntityRow): Promise<EveEntityRow>;
}
