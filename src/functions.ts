/**
 * Netlify function bodies, kept apart from the entry files so tests can
 * run them against a mock container.
 *
 * A function instance is frozen once its response is returned, so both
 * wait for queued work and flush buffered logs before they finish.
 */

import { createRouter } from './api/router.js';
import type { Container } from './container.js';
import { ConflictError, NotFoundError } from './errors.js';
import type { SyncResult } from './types/models.js';

async function settle(container: Container): Promise<void> {
  await container.queue.drain();
  await container.logProvider.flush();
}

/** Handler for every /api/v1/* route. */
export function createApiFunction(container: Container): (req: Request) => Promise<Response> {
  const router = createRouter(container);

  return async (req) => {
    try {
      return await router.handle(req, { operator: false });
    } finally {
      await settle(container);
    }
  };
}

/**
 * Scheduled contract sync. Returns null when there is nothing to sync yet
 * or a sync started over the API is still running.
 */
export async function runScheduledSync(container: Container): Promise<SyncResult | null> {
  const log = container.logProvider;

  try {
    const result = await container.jobs.syncContracts();
    log.info(`Scheduled sync finished: ${result.error}`, { ...result });
    return result;
  } catch (err) {
    if (err instanceof NotFoundError || err instanceof ConflictError) {
      log.info(`Scheduled sync skipped: ${err.message}`);
      return null;
    }
    throw err;
  } finally {
    await settle(container);
  }
}
