/**
 * Prefixes every message with a tag, e.g. `[contract 149409005] stored`.
 * Tags nest: tagged(tagged(log, 'sync'), 'page 2') → `[sync] [page 2] …`.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export class TaggedLogProvider implements ILogProvider {
  constructor(
    private readonly inner: ILogProvider,
    readonly tag: string
  ) {}

  log(event: LogEvent): void {
    this.inner.log({ ...event, message: `[${this.tag}] ${event.message}` });
  }

  flush(): Promise<void> {
    return this.inner.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}

export function tagged(log: ILogProvider, tag: string | number): ILogProvider {
  return new TaggedLogProvider(log, String(tag));
}
