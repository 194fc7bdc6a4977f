import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createApiFunction, runScheduledSync } from '../src/functions.js';
import { CONTRACTS_QUEUE } from '../src/jobs/TaskQueue.js';
import { ADMIN_KEY, createMockWorld, OPERATOR_WEBHOOK, type MockWorld } from './mocks/MockWorld.js';
import { SYNC_CHARACTER_ID, makeEsiContract } from './mocks/fixtures.js';

describe('createApiFunction', () => {
  let world: MockWorld;

  beforeEach(() => {
    world = createMockWorld();
    world.esi.contracts = [makeEsiContract()];
  });

  function setupRequest(): Request {
    return new Request('http://localhost/api/v1/handler', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${ADMIN_KEY}` },
      body: JSON.stringify({ characterId: SYNC_CHARACTER_ID }),
    });
  }

  it('should finish queued work before returning', async () => {
    const handle = createApiFunction(world.container);

    const res = await handle(setupRequest());

    expect(res.status).toBe(200);
    expect(world.container.queue.size(CONTRACTS_QUEUE)).toBe(0);
    expect(world.esi.calls.getCorporationContracts).toBe(1);
    expect(world.contractRepo.getAll()).toHaveLength(1);
  });

  it('should flush the logs for every request', async () => {
    const flush = vi.spyOn(world.log, 'flush');
    const handle = createApiFunction(world.container);

    const res = await handle(new Request('http://localhost/api/v1/handler', { method: 'GET' }));

    expect(res.status).toBe(404);
    expect(flush).toHaveBeenCalledTimes(1);
  });
});

describe('runScheduledSync', () => {
  let world: MockWorld;

  beforeEach(() => {
    world = createMockWorld();
  });

  it('should skip the run before a handler is set up', async () => {
    const result = await runScheduledSync(world.container);

    expect(result).toBeNull();
    expect(world.log.messages('info')).toContain(
      'Scheduled sync skipped: No contract handler has been set up'
    );
  });

  it('should sync, price and notify', async () => {
    await world.addHandler();
    await world.addPricing();
    world.esi.contracts = [makeEsiContract()];

    const result = await runScheduledSync(world.container);

    expect(result).toEqual({ changed: true, error: 'NONE', contractsCount: 1, failedCount: 0 });
    expect(world.contractRepo.getAll()[0]?.pricing_id).toBe(1);
    expect(world.webhook.sentTo(OPERATOR_WEBHOOK)).toHaveLength(1);
    expect(world.log.messages('info')).toContain('Scheduled sync finished: NONE');
  });

  it('should rethrow unexpected failures after flushing the logs', async () => {
    vi.spyOn(world.container.jobs, 'syncContracts').mockRejectedValueOnce(new Error('connection reset'));
    const flush = vi.spyOn(world.log, 'flush');

    await expect(runScheduledSync(world.container)).rejects.toThrow('connection reset');
    expect(flush).toHaveBeenCalledTimes(1);
  });
});
