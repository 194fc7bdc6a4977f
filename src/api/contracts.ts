/**
 * Contract endpoints.
 * GET /api/v1/contracts?category=active|all  Synced contracts (default: active)
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';
import { CONTRACT_LIST_CATEGORIES, isContractListCategory } from '../services/ContractService.js';

export function createContractHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, errorHandler)(async (req, _ctx) => {
    const url = new URL(req.url);
    const category = url.searchParams.get('category') ?? 'active';

    if (!isContractListCategory(category)) {
      throw new ValidationError(
        `category must be one of: ${CONTRACT_LIST_CATEGORIES.join(', ')}`
      );
    }

    const result = await container.contractService.list(category);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { list };
}
