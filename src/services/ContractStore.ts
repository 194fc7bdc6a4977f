/**
 * Contract store.
 * Maps an ESI courier contract plus its resolved parties onto the local
 * contract row. Synced columns are always overwritten; pricing_id, issues
 * and date_notified belong to later stages and are never written here.
 */

import { ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IContractRepository } from '../repositories/IContractRepository.js';
import type {
  ContractHandlerRow,
  ContractRow,
  ContractSyncedFields,
  EveEntityRow,
  LocationRow,
} from '../types/database.js';
import type { EsiContract } from '../types/esi.js';
import { isContractStatus, isTerminalStatus } from '../types/models.js';

export interface ResolvedContractParties {
  issuer: EveEntityRow;
  issuerCorporation: EveEntityRow;
  /** Character or corporation that accepted the contract, null while open. */
  acceptor: EveEntityRow | null;
  startLocation: LocationRow;
  endLocation: LocationRow;
}

export interface UpsertResult {
  contract: ContractRow;
  created: boolean;
}

export class ContractStore {
  constructor(
    private readonly contractRepo: IContractRepository,
    private readonly log: ILogProvider
  ) {}

  async upsert(
    handler: ContractHandlerRow,
    contract: EsiContract,
    resolved: ResolvedContractParties
  ): Promise<UpsertResult> {
    const fields = toSyncedFields(handler, contract, resolved);
    const existing = await this.contractRepo.findByContractId(handler.id, contract.contract_id);

    if (!existing) {
      return { contract: await this.contractRepo.insert(fields), created: true };
    }

    if (isTerminalStatus(existing.status) && !isTerminalStatus(fields.status)) {
      this.log.warn(
        `Contract ${contract.contract_id}: ignoring status change ${existing.status} → ${fields.status}`
      );
      fields.status = existing.status;
    }

    return {
      contract: await this.contractRepo.updateSynced(existing.id, fields),
      created: false,
    };
  }
}

export function toSyncedFields(
  handler: ContractHandlerRow,
  contract: EsiContract,
  resolved: ResolvedContractParties
): ContractSyncedFields {
  if (!isContractStatus(contract.status)) {
    throw new ValidationError(`Contract ${contract.contract_id} has unknown status "${contract.status}"`);
  }

  const { acceptor } = resolved;
  const acceptorIsCharacter = acceptor?.category === 'character';

  return {
    handler_id: handler.id,
    contract_id: contract.contract_id,
    status: contract.status,
    issuer_id: resolved.issuer.id,
    issuer_corporation_id: resolved.issuerCorporation.id,
    acceptor_id: acceptor && acceptorIsCharacter ? acceptor.id : null,
    acceptor_corporation_id: acceptor
      ? acceptorIsCharacter
        ? acceptor.corporation_id
        : acceptor.id
      : null,
    start_location_id: resolved.startLocation.id,
    end_location_id: resolved.endLocation.id,
    collateral: contract.collateral ?? 0,
    reward: contract.reward ?? 0,
    volume: contract.volume ?? 0,
    days_to_complete: contract.days_to_complete ?? 0,
    for_corporation: contract.for_corporation,
    title: contract.title || null,
    date_issued: toIsoDate(contract.date_issued, 'date_issued', contract.contract_id),
    date_accepted: optionalIsoDate(contract.date_accepted, 'date_accepted', contract.contract_id),
    date_completed: optionalIsoDate(contract.date_completed, 'date_completed', contract.contract_id),
    date_expired: toIsoDate(contract.date_expired, 'date_expired', contract.contract_id),
  };
}

function toIsoDate(value: string, field: string, contractId: number): string {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`Contract ${contractId}: ${field} is not a valid date: "${value}"`);
  }
  return new Date(ms).toISOString();
}

function optionalIsoDate(value: string | undefined, field: string, contractId: number): string | null {
  return value ? toIsoDate(value, field, contractId) : null;
}
