import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { tagged } from '../../src/providers/TaggedLogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should auto-set timestamp if omitted', () => {
    provider.log({ level: 'info', message: 'no ts' });
    const ts = provider.events[0].timestamp ?? '';
    expect(new Date(ts).toISOString()).toBe(ts);
  });

  it('should preserve provided timestamp and fields', () => {
    const ts = '2026-01-15T12:00:00.000Z';
    provider.log({ level: 'warn', message: 'with ts', timestamp: ts, fields: { code: 'TOKEN_EXPIRED' } });
    expect(provider.events[0]).toEqual({
      level: 'warn',
      message: 'with ts',
      timestamp: ts,
      fields: { code: 'TOKEN_EXPIRED' },
    });
  });

  it('should log each convenience method at its level', () => {
    provider.debug('d');
    provider.info('i');
    provider.warn('w');
    provider.error('e');
    expect(provider.events.map((e) => e.level)).toEqual(['debug', 'info', 'warn', 'error']);
  });

  it('should drop events below minLevel', () => {
    const quiet = new ConsoleLogProvider({ minLevel: 'warn' });
    quiet.debug('d');
    quiet.info('i');
    quiet.warn('w');
    expect(quiet.messages()).toEqual(['w']);
  });

  it('messages() should filter by level', () => {
    provider.info('Stored 2 contracts');
    provider.error('Contract sync failed');
    provider.info('Notifications sent: 1, failed: 0');
    expect(provider.messages('info')).toEqual(['Stored 2 contracts', 'Notifications sent: 1, failed: 0']);
    expect(provider.messages('error')).toEqual(['Contract sync failed']);
  });

  it('flush() should resolve immediately', async () => {
    provider.info('test');
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  it('should write info to console.log when outputToConsole is true', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.log({ level: 'info', message: 'hello console', timestamp: '2026-01-15T12:00:00.000Z' });
    expect(spy).toHaveBeenCalledWith('2026-01-15T12:00:00.000Z [INFO] hello console');
  });

  it('should write warnings to console.error with fields', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.log({
      level: 'warn',
      message: 'careful',
      timestamp: '2026-01-15T12:00:00.000Z',
      fields: { contractId: 7 },
    });
    expect(spy).toHaveBeenCalledWith('2026-01-15T12:00:00.000Z [WARN] careful {"contractId":7}');
  });

  it('should not write to console by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    provider.info('silent');
    expect(spy).not.toHaveBeenCalled();
  });

  it('clear() should empty the events buffer', () => {
    provider.info('one');
    provider.info('two');
    provider.clear();
    expect(provider.events).toHaveLength(0);
  });
});

describe('tagged', () => {
  it('should prefix messages with the tag and keep fields', () => {
    const base = new ConsoleLogProvider();
    const log = tagged(base, 'contract 149');

    log.warn('Failed to identify acceptor', { acceptorId: 9 });

    expect(base.events[0]).toMatchObject({
      level: 'warn',
      message: '[contract 149] Failed to identify acceptor',
      fields: { acceptorId: 9 },
    });
  });

  it('should nest tags', () => {
    const base = new ConsoleLogProvider();
    const log = tagged(tagged(base, 'sync Alliance'), 'contract 149');

    log.info('stored');

    expect(base.messages()).toEqual(['[sync Alliance] [contract 149] stored']);
  });
});
