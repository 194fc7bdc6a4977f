import { describe, it, expect, beforeEach } from 'vitest';
import { ContractStore, toSyncedFields, type ResolvedContractParties } from '../../src/services/ContractStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { ValidationError } from '../../src/errors.js';
import type { EveEntityRow } from '../../src/types/database.js';
import { MockContractRepository } from '../mocks/MockContractRepository.js';
import {
  CORPORATION_ID,
  CUSTOMER_CORPORATION_ID,
  CUSTOMER_ID,
  PILOT_ID,
  amarr,
  jita,
  makeContract,
  makeEsiContract,
  makeHandler,
} from '../mocks/fixtures.js';

const customer: EveEntityRow = {
  id: CUSTOMER_ID,
  name: 'Customer One',
  category: 'character',
  corporation_id: CUSTOMER_CORPORATION_ID,
  alliance_id: null,
};
const customerCorporation: EveEntityRow = {
  id: CUSTOMER_CORPORATION_ID,
  name: 'Customer Corp',
  category: 'corporation',
  corporation_id: null,
  alliance_id: null,
};
const pilot: EveEntityRow = {
  id: PILOT_ID,
  name: 'Pilot Two',
  category: 'character',
  corporation_id: CORPORATION_ID,
  alliance_id: null,
};

function parties(overrides: Partial<ResolvedContractParties> = {}): ResolvedContractParties {
  return {
    issuer: customer,
    issuerCorporation: customerCorporation,
    acceptor: null,
    startLocation: jita(),
    endLocation: amarr(),
    ...overrides,
  };
}

describe('toSyncedFields', () => {
  it('should map an open contract', () => {
    const fields = toSyncedFields(makeHandler(), makeEsiContract(), parties());

    expect(fields).toMatchObject({
      handler_id: 1,
      contract_id: 149409005,
      status: 'outstanding',
      issuer_id: CUSTOMER_ID,
      issuer_corporation_id: CUSTOMER_CORPORATION_ID,
      acceptor_id: null,
      acceptor_corporation_id: null,
      collateral: 50_000_000,
      reward: 20_000_000,
      volume: 10_000,
      title: 'Minerals',
      date_issued: '2026-03-01T10:00:00.000Z',
      date_accepted: null,
      date_expired: '2026-03-15T10:00:00.000Z',
    });
  });

  it('should store a character acceptor with their corporation', () => {
    const fields = toSyncedFields(
      makeHandler(),
      makeEsiContract({ status: 'in_progress', acceptor_id: PILOT_ID, date_accepted: '2026-03-01T12:00:00Z' }),
      parties({ acceptor: pilot })
    );

    expect(fields.acceptor_id).toBe(PILOT_ID);
    expect(fields.acceptor_corporation_id).toBe(CORPORATION_ID);
    expect(fields.date_accepted).toBe('2026-03-01T12:00:00.000Z');
  });

  it('should store a corporation acceptor as acceptor corporation only', () => {
    const corporation: EveEntityRow = { ...customerCorporation, id: CORPORATION_ID };
    const fields = toSyncedFields(
      makeHandler(),
      makeEsiContract({ acceptor_id: CORPORATION_ID }),
      parties({ acceptor: corporation })
    );

    expect(fields.acceptor_id).toBeNull();
    expect(fields.acceptor_corporation_id).toBe(CORPORATION_ID);
  });

  it('should default missing numbers and empty titles', () => {
    const esiContract = makeEsiContract({ title: '' });
    delete esiContract.collateral;
    delete esiContract.volume;

    const fields = toSyncedFields(makeHandler(), esiContract, parties());

    expect(fields.collateral).toBe(0);
    expect(fields.volume).toBe(0);
    expect(fields.title).toBeNull();
  });

  it('should reject an unknown status', () => {
    expect(() => toSyncedFields(makeHandler(), makeEsiContract({ status: 'misplaced' }), parties())).toThrow(
      ValidationError
    );
  });

  it('should reject an invalid date', () => {
    expect(() =>
      toSyncedFields(makeHandler(), makeEsiContract({ date_issued: 'yesterday' }), parties())
    ).toThrow('Contract 149409005: date_issued is not a valid date: "yesterday"');
  });
});

describe('ContractStore', () => {
  let contractRepo: MockContractRepository;
  let log: ConsoleLogProvider;
  let store: ContractStore;

  beforeEach(() => {
    contractRepo = new MockContractRepository();
    log = new ConsoleLogProvider();
    store = new ContractStore(contractRepo, log);
  });

  it('should insert a new contract', async () => {
    const result = await store.upsert(makeHandler(), makeEsiContract(), parties());

    expect(result.created).toBe(true);
    expect(result.contract).toMatchObject({ pricing_id: null, issues: null, date_notified: null });
    expect(contractRepo.getAll()).toHaveLength(1);
  });

  it('should update synced fields and keep pricing and notification state', async () => {
    contractRepo.put(
      makeContract({ pricing_id: 3, issues: [], date_notified: '2026-03-01T10:05:00.000Z' })
    );

    const result = await store.upsert(
      makeHandler(),
      makeEsiContract({ status: 'in_progress', acceptor_id: PILOT_ID, date_accepted: '2026-03-01T12:00:00Z' }),
      parties({ acceptor: pilot })
    );

    expect(result.created).toBe(false);
    expect(contractRepo.getAll()).toHaveLength(1);
    expect(result.contract).toMatchObject({
      status: 'in_progress',
      acceptor_id: PILOT_ID,
      pricing_id: 3,
      issues: [],
      date_notified: '2026-03-01T10:05:00.000Z',
    });
  });

  it('should not move a finished contract back to an open status', async () => {
    contractRepo.put(makeContract({ status: 'finished' }));

    const result = await store.upsert(makeHandler(), makeEsiContract({ status: 'outstanding', reward: 25_000_000 }), parties());

    expect(result.contract.status).toBe('finished');
    expect(result.contract.reward).toBe(25_000_000);
    expect(log.messages('warn')).toEqual([
      'Contract 149409005: ignoring status change finished → outstanding',
    ]);
  });

  it('should allow moving between terminal statuses', async () => {
    contractRepo.put(makeContract({ status: 'finished' }));

    const result = await store.upsert(makeHandler(), makeEsiContract({ status: 'deleted' }), parties());

    expect(result.contract.status).toBe('deleted');
  });
});
