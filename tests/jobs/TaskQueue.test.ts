import { describe, it, expect, beforeEach } from 'vitest';
import { TaskQueue } from '../../src/jobs/TaskQueue.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('TaskQueue', () => {
  let log: ConsoleLogProvider;
  let queue: TaskQueue;

  beforeEach(() => {
    log = new ConsoleLogProvider();
    queue = new TaskQueue(log);
  });

  it('should resolve with the task result', async () => {
    await expect(queue.submit('a', 'answer', async () => 42)).resolves.toBe(42);
  });

  it('should run tasks with the same key one after another', async () => {
    const order: string[] = [];
    const gate = deferred();

    const first = queue.submit('contracts', 'first', async () => {
      order.push('first started');
      await gate.promise;
      order.push('first finished');
    });
    const second = queue.submit('contracts', 'second', async () => {
      order.push('second started');
    });

    expect(queue.size('contracts')).toBe(2);
    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first started', 'first finished', 'second started']);
    expect(queue.size('contracts')).toBe(0);
  });

  it('should run tasks with different keys concurrently', async () => {
    const gate = deferred();
    const blocked = queue.submit('a', 'blocked', () => gate.promise);

    await expect(queue.submit('b', 'free', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('should keep going after a failed task', async () => {
    const failed = queue.submit('a', 'broken', async () => {
      throw new Error('boom');
    });
    const next = queue.submit('a', 'next', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should log failures of enqueued tasks', async () => {
    queue.enqueue('contracts', 'broken', async () => {
      throw new Error('boom');
    });

    await queue.drain();

    expect(log.events.find((e) => e.level === 'error')).toMatchObject({
      message: 'Task broken failed: boom',
      fields: { queue: 'contracts' },
    });
  });

  it('should drain tasks queued while draining', async () => {
    const done: string[] = [];
    queue.enqueue('a', 'outer', async () => {
      done.push('outer');
      queue.enqueue('b', 'inner', async () => {
        done.push('inner');
      });
    });

    await queue.drain();

    expect(done).toEqual(['outer', 'inner']);
  });
});
