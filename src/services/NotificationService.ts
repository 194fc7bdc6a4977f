/**
 * Notification service.
 * Posts new outstanding contracts to the operator webhook, once per
 * contract, and contract status changes to the customer webhook, once per
 * contract and status.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { AppConfig } from '../config.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IWebhookProvider, WebhookMessage } from '../providers/IWebhookProvider.js';
import type { IContractHandlerRepository } from '../repositories/IContractHandlerRepository.js';
import type { IContractRepository } from '../repositories/IContractRepository.js';
import type { ICustomerNotificationRepository } from '../repositories/ICustomerNotificationRepository.js';
import type { IEveEntityRepository } from '../repositories/IEveEntityRepository.js';
import type { ILocationRepository } from '../repositories/ILocationRepository.js';
import type { ContractRow } from '../types/database.js';
import {
  CUSTOMER_NOTIFICATION_STATUSES,
  type DispatchResult,
  type NotificationAudience,
} from '../types/models.js';
import {
  buildCustomerMessage,
  buildOperatorMessage,
  organizationLogoUrl,
  type ContractDetails,
} from './NotificationMessages.js';

export type NotificationConfig = Pick<AppConfig, 'discord' | 'hoursUntilStaleStatus'>;

export interface DispatchOptions {
  /** Wait between sends. Default: true. */
  rateLimited?: boolean;
  /** Resend to both audiences regardless of notification history. Default: false. */
  force?: boolean;
}

export interface NotificationServiceOptions {
  /** Pause between sends when rate limited. Default: 1000. */
  rateLimitDelayMs?: number;
  /** Clock, in ms since epoch. */
  now?: () => number;
}

const HOUR_MS = 3_600_000;

/** The latest of issued, accepted and completed is older than the window. */
export function hasStaleStatus(
  contract: Pick<ContractRow, 'date_issued' | 'date_accepted' | 'date_completed'>,
  hoursUntilStale: number,
  now: number
): boolean {
  const latest = Math.max(
    ...[contract.date_issued, contract.date_accepted, contract.date_completed]
      .filter((d): d is string => d !== null)
      .map((d) => Date.parse(d))
  );
  return now - latest > hoursUntilStale * HOUR_MS;
}

export class NotificationService {
  private readonly rateLimitDelayMs: number;
  private readonly now: () => number;

  constructor(
    private readonly contractRepo: IContractRepository,
    private readonly customerNotificationRepo: ICustomerNotificationRepository,
    private readonly handlerRepo: IContractHandlerRepository,
    private readonly entityRepo: IEveEntityRepository,
    private readonly locationRepo: ILocationRepository,
    private readonly webhook: IWebhookProvider,
    private readonly config: NotificationConfig,
    private readonly log: ILogProvider,
    opts: NotificationServiceOptions = {}
  ) {
    this.rateLimitDelayMs = opts.rateLimitDelayMs ?? 1000;
    this.now = opts.now ?? Date.now;
  }

  async dispatch(opts: DispatchOptions = {}): Promise<DispatchResult> {
    const rateLimited = opts.rateLimited ?? true;
    const force = opts.force ?? false;
    const result: DispatchResult = { ok: true, sent: 0, failed: 0 };

    const { webhookUrl, customersWebhookUrl } = this.config.discord;

    if (webhookUrl) {
      await this.notifyOperators(webhookUrl, force, rateLimited, result);
    } else {
      this.log.debug('Operator webhook not configured');
    }

    if (customersWebhookUrl) {
      await this.notifyCustomers(customersWebhookUrl, force, rateLimited, result);
    } else {
      this.log.debug('Customer webhook not configured');
    }

    return result;
  }

  // ── Private ──

  private async notifyOperators(
    url: string,
    force: boolean,
    rateLimited: boolean,
    result: DispatchResult
  ): Promise<void> {
    const eligible = await this.contractRepo.find({
      statuses: ['outstanding'],
      hasPricing: true,
      expiresAfter: new Date(this.now()).toISOString(),
      ...(!force && { unnotified: true }),
    });
    if (eligible.length === 0) return;

    this.log.info(`Sending operator notifications for ${eligible.length} contracts`);
    const details = await this.loadDetails(eligible);

    for (const item of details) {
      const delivered = await this.send(
        'operator',
        url,
        item.contract,
        buildOperatorMessage(item, this.config.discord.mentions),
        result
      );
      if (delivered) {
        await this.contractRepo.markNotified(item.contract.id, new Date(this.now()).toISOString());
      }
      if (rateLimited) await sleep(this.rateLimitDelayMs);
    }
  }

  private async notifyCustomers(
    url: string,
    force: boolean,
    rateLimited: boolean,
    result: DispatchResult
  ): Promise<void> {
    const now = this.now();
    const candidates = await this.contractRepo.find({
      statuses: CUSTOMER_NOTIFICATION_STATUSES,
      hasPricing: true,
      expiresAfter: new Date(now).toISOString(),
    });

    const eligible: ContractRow[] = [];
    for (const contract of candidates) {
      if (hasStaleStatus(contract, this.config.hoursUntilStaleStatus, now)) {
        this.log.debug(`Contract ${contract.contract_id} has stale status`);
      } else if (!force && (await this.customerNotificationRepo.exists(contract.id, contract.status))) {
        continue;
      } else {
        eligible.push(contract);
      }
    }
    if (eligible.length === 0) return;

    this.log.info(`Sending customer notifications for ${eligible.length} contracts`);
    const details = await this.loadDetails(eligible);

    for (const item of details) {
      const delivered = await this.send(
        'customer',
        url,
        item.contract,
        buildCustomerMessage(item),
        result
      );
      if (delivered) {
        await this.customerNotificationRepo.record(
          item.contract.id,
          item.contract.status,
          new Date(this.now()).toISOString()
        );
      }
      if (rateLimited) await sleep(this.rateLimitDelayMs);
    }
  }

  /** Returns false when the send failed; the failure is logged and counted. */
  private async send(
    audience: NotificationAudience,
    url: string,
    contract: ContractRow,
    message: WebhookMessage,
    result: DispatchResult
  ): Promise<boolean> {
    try {
      await this.webhook.send(url, { ...message, ...(await this.branding()) });
      result.sent++;
      this.log.info(`Sent ${audience} notification for contract ${contract.contract_id}`);
      return true;
    } catch (err) {
      result.failed++;
      this.log.error(
        `Failed to send ${audience} notification for contract ${contract.contract_id}: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
      return false;
    }
  }

  private async branding(): Promise<Pick<WebhookMessage, 'username' | 'avatarUrl'>> {
    const { disableBranding, avatarName } = this.config.discord;
    if (disableBranding) return {};

    const handler = await this.handlerRepo.find();
    return {
      username: avatarName,
      ...(handler && { avatarUrl: organizationLogoUrl(handler) }),
    };
  }

  private async loadDetails(contracts: ContractRow[]): Promise<ContractDetails[]> {
    const entityIds = new Set<number>();
    const locationIds = new Set<number>();
    for (const c of contracts) {
      entityIds.add(c.issuer_id);
      if (c.acceptor_id !== null) entityIds.add(c.acceptor_id);
      locationIds.add(c.start_location_id);
      locationIds.add(c.end_location_id);
    }

    const [entities, locations] = await Promise.all([
      this.entityRepo.findByIds([...entityIds]),
      this.locationRepo.findByIds([...locationIds]),
    ]);
    const entityById = new Map(entities.map((e) => [e.id, e]));
    const locationById = new Map(locations.map((l) => [l.id, l]));

    return contracts.map((contract) => ({
      contract,
      issuer: entityById.get(contract.issuer_id) ?? null,
      acceptor: contract.acceptor_id === null ? null : (entityById.get(contract.acceptor_id) ?? null),
      startLocation: locationById.get(contract.start_location_id) ?? null,
      endLocation: locationById.get(contract.end_location_id) ?? null,
    }));
  }
}
