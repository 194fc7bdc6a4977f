/**
 * Contract sync service.
 * Pulls the handler organization's courier contracts from ESI, stores the
 * relevant ones, re-matches pricings and triggers notifications.
 *
 * Result of every run is stored on the handler as last_error; last_sync is
 * stamped on success only.
 */

import { createHash } from 'node:crypto';
import {
  ConflictError,
  EsiError,
  NotFoundError,
  TokenExpiredError,
  TokenInvalidError,
} from '../errors.js';
import type { IEsiClient } from '../providers/IEsiClient.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITokenProvider } from '../providers/ITokenProvider.js';
import { tagged } from '../providers/TaggedLogProvider.js';
import type { IContractHandlerRepository } from '../repositories/IContractHandlerRepository.js';
import type { ContractHandlerRow, EveEntityRow } from '../types/database.js';
import type { EsiContract } from '../types/esi.js';
import {
  organizationCategoryForMode,
  type OperationMode,
  type SyncErrorCode,
  type SyncResult,
} from '../types/models.js';
import type { ContractStore, ResolvedContractParties } from './ContractStore.js';
import type { EntityResolverService } from './EntityResolverService.js';
import type { DispatchOptions, NotificationService } from './NotificationService.js';
import type { PricingService } from './PricingService.js';

export const SYNC_SCOPES = [
  'esi-contracts.read_corporation_contracts.v1',
  'esi-universe.read_structures.v1',
] as const;

export interface IngestOptions {
  /** Run notifications after the sync. Default: true. */
  dispatch?: boolean;
  /** Passed to the notification run. */
  rateLimited?: DispatchOptions['rateLimited'];
}

/** Sync failure that is stored on the handler as the given code. */
class SyncAbort extends Error {
  constructor(
    readonly code: SyncErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'SyncAbort';
  }
}

/** Courier contracts assigned to the handler's organization under the given mode. */
export function isRelevantContract(
  contract: EsiContract,
  handler: Pick<ContractHandlerRow, 'organization_id'>,
  mode: OperationMode
): boolean {
  if (contract.type !== 'courier') return false;

  const assignedToOrganization = contract.assignee_id === handler.organization_id;
  switch (mode) {
    case 'my_alliance':
    case 'corp_in_alliance':
      return assignedToOrganization;
    case 'my_corporation':
      return assignedToOrganization && contract.issuer_corporation_id === handler.organization_id;
    case 'corp_public':
      return assignedToOrganization || contract.availability === 'public';
  }
}

export function contractsVersionHash(contracts: EsiContract[]): string {
  return createHash('sha256').update(JSON.stringify(contracts)).digest('hex');
}

export class ContractSyncService {
  private readonly running = new Set<number>();

  constructor(
    private readonly handlerRepo: IContractHandlerRepository,
    private readonly tokens: ITokenProvider,
    private readonly esi: IEsiClient,
    private readonly resolver: EntityResolverService,
    private readonly store: ContractStore,
    private readonly pricing: PricingService,
    private readonly notifications: NotificationService,
    private readonly config: { operationMode: OperationMode },
    private readonly log: ILogProvider
  ) {}

  async ingest(force = false, opts: IngestOptions = {}): Promise<SyncResult> {
    const handler = await this.handlerRepo.find();
    if (!handler) {
      throw new NotFoundError('No contract handler has been set up');
    }
    if (this.running.has(handler.id)) {
      throw new ConflictError('SYNC_IN_PROGRESS', 'A contract sync is already running');
    }

    this.running.add(handler.id);
    try {
      return await this.run(handler, force, opts);
    } finally {
      this.running.delete(handler.id);
    }
  }

  // ── Private ──

  private async run(
    handler: ContractHandlerRow,
    force: boolean,
    opts: IngestOptions
  ): Promise<SyncResult> {
    const log = tagged(this.log, `sync ${handler.organization_name}`);
    const result: SyncResult = { changed: false, error: 'NONE', contractsCount: 0, failedCount: 0 };

    try {
      const token = await this.checkPreconditions(handler);

      const contracts = (await this.fetchContracts(handler, token)).filter((c) =>
        isRelevantContract(c, handler, this.config.operationMode)
      );
      result.contractsCount = contracts.length;
      log.info(`Retrieved ${contracts.length} relevant courier contracts from ESI`);

      const versionHash = contractsVersionHash(contracts);
      if (!force && versionHash === handler.version_hash) {
        log.info('Contracts are unchanged');
        await this.handlerRepo.update(handler.id, {
          last_sync: new Date().toISOString(),
          last_error: 'NONE',
        });
      } else {
        const written = await this.storeContracts(handler, contracts, token, result, log);

        if (contracts.length > 0 && result.failedCount === contracts.length) {
          throw new SyncAbort('UNKNOWN', 'Failed to store any contract');
        }

        if (written > 0) {
          result.changed = true;
          await this.pricing.reconcile(handler.id);
        }

        // Last write of the run: a failure above leaves the old hash in place.
        await this.handlerRepo.update(handler.id, {
          last_sync: new Date().toISOString(),
          last_error: 'NONE',
          // Partial failures keep the old hash so the next run retries them.
          ...(result.failedCount === 0 && { version_hash: versionHash }),
        });
      }
    } catch (err) {
      result.error = err instanceof SyncAbort ? err.code : 'UNKNOWN';
      log.error(`Contract sync failed: ${err instanceof Error ? err.message : String(err)}`, {
        code: result.error,
      });
      await this.handlerRepo.update(handler.id, { last_error: result.error });
      return result;
    }

    if (opts.dispatch ?? true) {
      try {
        const dispatched = await this.notifications.dispatch({ rateLimited: opts.rateLimited });
        log.info(`Notifications sent: ${dispatched.sent}, failed: ${dispatched.failed}`);
      } catch (err) {
        // The sync itself is committed; the next run picks up unsent notifications.
        log.error(`Sending notifications failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    return result;
  }

  /** Returns the sync token; every failure is a SyncAbort. Makes no ESI calls. */
  private async checkPreconditions(handler: ContractHandlerRow): Promise<string> {
    if (handler.character_id === null || handler.character_corporation_id === null) {
      throw new SyncAbort('NO_CHARACTER', 'No character set for fetching contracts');
    }

    const mode = this.config.operationMode;
    if (
      handler.operation_mode !== mode ||
      handler.organization_category !== organizationCategoryForMode(mode)
    ) {
      throw new SyncAbort(
        'OPERATION_MODE_MISMATCH',
        `Handler is set up for ${handler.operation_mode} with a ${handler.organization_category}, configured mode is ${mode}`
      );
    }

    try {
      return await this.tokens.getToken(handler.character_id, SYNC_SCOPES);
    } catch (err) {
      if (err instanceof TokenExpiredError) throw new SyncAbort('TOKEN_EXPIRED', err.message);
      if (err instanceof TokenInvalidError) throw new SyncAbort('TOKEN_INVALID', err.message);
      throw err;
    }
  }

  private async fetchContracts(handler: ContractHandlerRow, token: string): Promise<EsiContract[]> {
    const corporationId = handler.character_corporation_id ?? handler.organization_id;
    try {
      return await this.esi.getCorporationContracts(corporationId, token);
    } catch (err) {
      if (err instanceof EsiError && err.isTransient) {
        throw new SyncAbort('UPSTREAM_UNAVAILABLE', err.message);
      }
      if (err instanceof EsiError && err.isForbidden) {
        throw new SyncAbort('INSUFFICIENT_PERMISSIONS', err.message);
      }
      throw err;
    }
  }

  /** Returns the number of contracts written; failures are counted in `result`. */
  private async storeContracts(
    handler: ContractHandlerRow,
    contracts: EsiContract[],
    token: string,
    result: SyncResult,
    log: ILogProvider
  ): Promise<number> {
    let written = 0;
    let created = 0;

    for (const contract of contracts) {
      const contractLog = tagged(log, `contract ${contract.contract_id}`);
      try {
        const outcome = await this.store.upsert(
          handler,
          contract,
          await this.resolveParties(contract, token, contractLog)
        );
        written++;
        if (outcome.created) created++;
      } catch (err) {
        if (err instanceof EsiError && err.isTransient) {
          // ESI went away mid-run: the remaining contracts would fail the same way.
          throw new SyncAbort('UPSTREAM_UNAVAILABLE', err.message);
        }
        result.failedCount++;
        contractLog.error(`Failed to store contract: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    log.info(`Stored ${written} contracts (${created} new, ${result.failedCount} failed)`);
    return written;
  }

  private async resolveParties(
    contract: EsiContract,
    token: string,
    log: ILogProvider
  ): Promise<ResolvedContractParties> {
    if (contract.start_location_id === undefined || contract.end_location_id === undefined) {
      throw new Error('Courier contract without start or end location');
    }

    const [issuer, issuerCorporation, startLocation, endLocation] = [
      await this.resolver.resolveEntity(contract.issuer_id),
      await this.resolver.resolveEntity(contract.issuer_corporation_id),
      (await this.resolver.resolveLocation(contract.start_location_id, token)).record,
      (await this.resolver.resolveLocation(contract.end_location_id, token)).record,
    ];

    let acceptor: EveEntityRow | null = null;
    if (contract.acceptor_id !== 0) {
      try {
        acceptor = await this.resolver.resolveEntity(contract.acceptor_id);
      } catch (err) {
        if (err instanceof EsiError && err.isTransient) throw err;
        log.warn(`Failed to identify acceptor: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    return { issuer, issuerCorporation, acceptor, startLocation, endLocation };
  }
}
