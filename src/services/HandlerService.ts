/**
 * Contract handler service.
 * Sets up the organization whose contracts are synced and reports its
 * sync status.
 */

import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import type { IContractHandlerRepository } from '../repositories/IContractHandlerRepository.js';
import type { IContractRepository } from '../repositories/IContractRepository.js';
import type { ICustomerNotificationRepository } from '../repositories/ICustomerNotificationRepository.js';
import type { HandlerStatusResponse, SetupHandlerRequest } from '../types/api.js';
import type { ContractHandlerRow } from '../types/database.js';
import {
  OPERATION_MODE_LABELS,
  SYNC_ERROR_MESSAGES,
  organizationCategoryForMode,
  type OperationMode,
} from '../types/models.js';
import type { EntityResolverService } from './EntityResolverService.js';

export interface HandlerConfig {
  operationMode: OperationMode;
  contractSyncGraceMinutes: number;
}

/** Last sync succeeded and is recent enough. */
export function isSyncOk(
  handler: Pick<ContractHandlerRow, 'last_error' | 'last_sync'>,
  graceMinutes: number,
  now: number = Date.now()
): boolean {
  if (handler.last_error !== 'NONE' || handler.last_sync === null) return false;
  return now - Date.parse(handler.last_sync) <= graceMinutes * 60_000;
}

/** How contracts must be made available, e.g. "Private (Justice League) [My Alliance]". */
export function availabilityText(
  handler: Pick<ContractHandlerRow, 'organization_name' | 'operation_mode'>
): string {
  const suffix =
    handler.operation_mode === 'my_alliance' || handler.operation_mode === 'my_corporation'
      ? ` [${OPERATION_MODE_LABELS[handler.operation_mode]}]`
      : '';
  return `Private (${handler.organization_name})${suffix}`;
}

export class HandlerService {
  constructor(
    private readonly handlerRepo: IContractHandlerRepository,
    private readonly contractRepo: IContractRepository,
    private readonly customerNotificationRepo: ICustomerNotificationRepository,
    private readonly resolver: EntityResolverService,
    private readonly config: HandlerConfig
  ) {}

  async get(): Promise<ContractHandlerRow> {
    const handler = await this.handlerRepo.find();
    if (!handler) {
      throw new NotFoundError('No contract handler has been set up');
    }
    return handler;
  }

  async status(now: number = Date.now()): Promise<HandlerStatusResponse> {
    const handler = await this.get();
    return {
      organizationId: handler.organization_id,
      organizationName: handler.organization_name,
      organizationCategory: handler.organization_category,
      operationMode: handler.operation_mode,
      operationModeFriendly: OPERATION_MODE_LABELS[handler.operation_mode],
      availability: availabilityText(handler),
      characterId: handler.character_id,
      pricePerVolumeModifier: handler.price_per_volume_modifier,
      lastSync: handler.last_sync,
      lastError: handler.last_error,
      lastErrorMessage: SYNC_ERROR_MESSAGES[handler.last_error],
      isSyncOk: isSyncOk(handler, this.config.contractSyncGraceMinutes, now),
    };
  }

  /**
   * Point the handler at the sync character's organization for the
   * configured operation mode. Creates the handler on first use.
   * Moving to another organization drops the contracts of the old one.
   */
  async setup(input: SetupHandlerRequest): Promise<ContractHandlerRow> {
    const mode = this.config.operationMode;
    const character = await this.resolver.resolveEntity(input.characterId);
    if (character.category !== 'character' || character.corporation_id === null) {
      throw new ValidationError(`${input.characterId} is not a character`);
    }

    const category = organizationCategoryForMode(mode);
    const organizationId = category === 'alliance' ? character.alliance_id : character.corporation_id;
    if (organizationId === null) {
      throw new ValidationError(
        `Can not setup contract handler, because ${character.name} is not a member of any alliance`
      );
    }
    const organization = await this.resolver.resolveEntity(organizationId);

    const existing = await this.handlerRepo.find();
    if (existing && existing.operation_mode !== mode) {
      throw new ConflictError(
        'OPERATION_MODE_MISMATCH',
        'There already is a contract handler installed for a different operation mode'
      );
    }

    const fields = {
      organization_id: organization.id,
      organization_name: organization.name,
      organization_category: category,
      operation_mode: mode,
      character_id: character.id,
      character_corporation_id: character.corporation_id,
      owner_user_id: input.ownerUserId ?? existing?.owner_user_id ?? null,
      price_per_volume_modifier:
        input.pricePerVolumeModifier !== undefined
          ? input.pricePerVolumeModifier
          : (existing?.price_per_volume_modifier ?? null),
    };

    if (existing) {
      const organizationChanged = existing.organization_id !== organization.id;
      if (organizationChanged) {
        const deleted = await this.contractRepo.deleteByHandler(existing.id);
        await this.customerNotificationRepo.deleteForContracts(deleted);
      }
      return this.handlerRepo.update(existing.id, {
        ...fields,
        ...(organizationChanged && { version_hash: null }),
      });
    }

    return this.handlerRepo.insert({
      ...fields,
      version_hash: null,
      last_sync: null,
      last_error: 'NONE',
    });
  }
}
