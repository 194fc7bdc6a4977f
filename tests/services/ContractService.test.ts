import { describe, it, expect, beforeEach } from 'vitest';
import { ContractService, isContractListCategory } from '../../src/services/ContractService.js';
import { MockContractRepository } from '../mocks/MockContractRepository.js';
import { MockEveEntityRepository } from '../mocks/MockEveEntityRepository.js';
import { MockLocationRepository } from '../mocks/MockLocationRepository.js';
import {
  CONTRACT_ID,
  CUSTOMER_ID,
  CUSTOMER_NAME,
  JITA_NAME,
  PILOT_ID,
  amarr,
  jita,
  makeContract,
} from '../mocks/fixtures.js';

describe('isContractListCategory', () => {
  it('should accept known categories only', () => {
    expect(isContractListCategory('active')).toBe(true);
    expect(isContractListCategory('all')).toBe(true);
    expect(isContractListCategory('finished')).toBe(false);
  });
});

describe('ContractService', () => {
  let contractRepo: MockContractRepository;
  let entityRepo: MockEveEntityRepository;
  let locationRepo: MockLocationRepository;
  let service: ContractService;

  beforeEach(async () => {
    contractRepo = new MockContractRepository();
    entityRepo = new MockEveEntityRepository();
    locationRepo = new MockLocationRepository();
    service = new ContractService(contractRepo, entityRepo, locationRepo);

    await entityRepo.upsert({
      id: CUSTOMER_ID,
      name: CUSTOMER_NAME,
      category: 'character',
      corporation_id: null,
      alliance_id: null,
    });
    await locationRepo.upsert(jita());
  });

  it('should list outstanding and in progress contracts by default', async () => {
    contractRepo.put(makeContract({ id: 1, contract_id: 1 }));
    contractRepo.put(makeContract({ id: 2, contract_id: 2, status: 'in_progress' }));
    contractRepo.put(makeContract({ id: 3, contract_id: 3, status: 'finished' }));

    const contracts = await service.list();

    expect(contracts.map((c) => c.contractId)).toEqual([1, 2]);
  });

  it('should list every contract for the all category', async () => {
    contractRepo.put(makeContract({ id: 1, contract_id: 1 }));
    contractRepo.put(makeContract({ id: 3, contract_id: 3, status: 'finished' }));

    const contracts = await service.list('all');

    expect(contracts).toHaveLength(2);
  });

  it('should resolve names and fall back to ids', async () => {
    contractRepo.put(makeContract({ acceptor_id: PILOT_ID, pricing_id: 1, issues: [] }));

    const [contract] = await service.list();

    expect(contract).toMatchObject({
      contractId: CONTRACT_ID,
      status: 'outstanding',
      route: 'Jita - ?',
      startLocation: JITA_NAME,
      endLocation: String(amarr().id),
      issuer: CUSTOMER_NAME,
      acceptor: String(PILOT_ID),
      pricingId: 1,
      issues: [],
      dateNotified: null,
    });
  });

  it('should report no acceptor for open contracts', async () => {
    contractRepo.put(makeContract());

    const [contract] = await service.list();

    expect(contract?.acceptor).toBeNull();
  });
});
