/**
 * Location data access interface.
 */

import type { LocationRow } from '../types/database.js';

export interface ILocationRepository {
  findById(id: number): Promise<LocationRow | null>;

  findByIds(ids: number[]): Promise<LocationRow[]>;

  /** Insert or replace by id. */
  upsert(row: LocationRow): Promise<LocationRow>;
}
