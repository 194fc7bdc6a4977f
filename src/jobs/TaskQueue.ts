/**
 * In-process task queue.
 * Tasks sharing a key run one after another in submission order; tasks
 * with different keys run concurrently. A failed task does not block the
 * tasks queued behind it.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';

/** Key for every task that reads or writes contracts. */
export const CONTRACTS_QUEUE = 'contracts';

export class TaskQueue {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly pending = new Map<string, number>();

  constructor(private readonly log: ILogProvider) {}

  /** Run `task` after everything already queued under `key`; resolves with its result. */
  submit<T>(key: string, name: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1);

    const result = previous.then(async () => {
      this.log.debug(`Task ${name} started`, { queue: key });
      const started = Date.now();
      try {
        const value = await task();
        this.log.debug(`Task ${name} finished in ${Date.now() - started} ms`, { queue: key });
        return value;
      } finally {
        this.settle(key);
      }
    });

    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    return result;
  }

  /** Fire-and-forget variant; failures are logged. */
  enqueue(key: string, name: string, task: () => Promise<unknown>): void {
    this.submit(key, name, task).catch((err: unknown) => {
      this.log.error(`Task ${name} failed: ${err instanceof Error ? err.message : String(err)}`, {
        queue: key,
      });
    });
  }

  /** Number of queued or running tasks for `key`. */
  size(key: string): number {
    return this.pending.get(key) ?? 0;
  }

  /** Resolves once every queue is empty, including tasks queued meanwhile. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }

  private settle(key: string): void {
    const remaining = (this.pending.get(key) ?? 1) - 1;
    if (remaining > 0) {
      this.pending.set(key, remaining);
      return;
    }
    this.pending.delete(key);
    this.tails.delete(key);
  }
}
