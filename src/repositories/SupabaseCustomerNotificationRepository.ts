/**
 * Supabase implementation of ICustomerNotificationRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ICustomerNotificationRepository } from './ICustomerNotificationRepository.js';
import type { CustomerNotificationRow } from '../types/database.js';
import type { ContractStatus } from '../types/models.js';

export class SupabaseCustomerNotificationRepository implements ICustomerNotificationRepository {
  constructor(private readonly db: SupabaseClient) {}

  async exists(contractPk: number, status: ContractStatus): Promise<boolean> {
    const { count, error } = await this.db
      .from('contract_customer_notifications')
      .select('*', { count: 'exact', head: true })
      .eq('contract_pk', contractPk)
      .eq('status', status);

    if (error) throw new Error(`Failed to check customer notification: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async record(
    contractPk: number,
    status: ContractStatus,
    at: string
  ): Promise<CustomerNotificationRow> {
    const { data, error } = await this.db
      .from('contract_customer_notifications')
      .upsert(
        { contract_pk: contractPk, status, date_notified: at },
        { onConflict: 'contract_pk,status' }
      )
      .select()
      .single();

    if (error) throw new Error(`Failed to record customer notification: ${error.message}`);
    return data as CustomerNotificationRow;
  }

  async deleteForContracts(contractPks: number[]): Promise<void> {
    if (contractPks.length === 0) return;

    const { error } = await this.db
      .from('contract_customer_notifications')
      .delete()
      .in('contract_pk', contractPks);

    if (error) throw new Error(`Failed to delete customer notifications: ${error.message}`);
  }
}
