/**
 * Background jobs.
 * Every job that touches contracts runs on the contracts queue, so a sync,
 * a pricing update and a notification run never interleave.
 */

import type { ContractSyncService } from '../services/ContractSyncService.js';
import type { NotificationService } from '../services/NotificationService.js';
import type { PricingService, ReconcileResult } from '../services/PricingService.js';
import type { DispatchResult, SyncResult } from '../types/models.js';
import { CONTRACTS_QUEUE, type TaskQueue } from './TaskQueue.js';

export class FreightJobs {
  constructor(
    private readonly queue: TaskQueue,
    private readonly sync: ContractSyncService,
    private readonly pricing: PricingService,
    private readonly notifications: NotificationService
  ) {}

  /** Sync contracts from ESI, then update pricing and send notifications. */
  syncContracts(force = false): Promise<SyncResult> {
    return this.queue.submit(CONTRACTS_QUEUE, force ? 'sync-contracts (forced)' : 'sync-contracts', () =>
      this.sync.ingest(force)
    );
  }

  updatePricing(): Promise<ReconcileResult> {
    return this.queue.submit(CONTRACTS_QUEUE, 'update-pricing', () => this.pricing.reconcile());
  }

  sendNotifications(force = false): Promise<DispatchResult> {
    return this.queue.submit(CONTRACTS_QUEUE, 'send-notifications', () =>
      this.notifications.dispatch({ force })
    );
  }

  /** Queue a sync without waiting for it; failures are logged by the queue. */
  startSync(force = false): void {
    this.queue.enqueue(CONTRACTS_QUEUE, 'sync-contracts', () => this.sync.ingest(force));
  }
}
