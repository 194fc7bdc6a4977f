/**
 * Pricing data access interface.
 */

import type { PricingInsert, PricingRow } from '../types/database.js';

export interface IPricingRepository {
  /** Ordered by id ascending. */
  findAll(): Promise<PricingRow[]>;

  /** Active pricings, ordered by id ascending. */
  findActive(): Promise<PricingRow[]>;

  findById(id: number): Promise<PricingRow | null>;

  /** Throws ConflictError when the route (start, end) already exists. */
  insert(row: PricingInsert): Promise<PricingRow>;

  /** Throws ConflictError when the change collides with another route. */
  update(id: number, data: Partial<PricingInsert>): Promise<PricingRow>;

  delete(id: number): Promise<void>;

  /** Unset is_default on every pricing except `exceptId`. */
  clearDefault(exceptId: number): Promise<void>;
}
