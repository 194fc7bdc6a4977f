/**
 * Manual location management.
 * Structures need the sync character's token, so a handler must exist.
 */

import { ForbiddenError, NotFoundError, EsiError, TokenExpiredError, TokenInvalidError } from '../errors.js';
import type { ITokenProvider } from '../providers/ITokenProvider.js';
import type { IContractHandlerRepository } from '../repositories/IContractHandlerRepository.js';
import type { LocationRow } from '../types/database.js';
import type { EntityResolverService } from './EntityResolverService.js';

export const LOCATION_SCOPES = ['esi-universe.read_structures.v1'] as const;

export class LocationService {
  constructor(
    private readonly handlerRepo: IContractHandlerRepository,
    private readonly tokens: ITokenProvider,
    private readonly resolver: EntityResolverService
  ) {}

  /** Fetch the location from ESI and store or refresh it. */
  async addLocation(locationId: number): Promise<LocationRow> {
    const handler = await this.handlerRepo.find();
    if (!handler || handler.character_id === null) {
      throw new NotFoundError('No contract handler with a sync character has been set up');
    }

    try {
      const token = await this.tokens.getToken(handler.character_id, LOCATION_SCOPES);
      return await this.resolver.refreshLocation(locationId, token);
    } catch (err) {
      if (err instanceof TokenExpiredError || err instanceof TokenInvalidError) {
        throw new ForbiddenError(`Sync character token unusable: ${err.message}`);
      }
      if (err instanceof EsiError && err.isForbidden) {
        throw new ForbiddenError(`Sync character has no access to location ${locationId}`);
      }
      if (err instanceof EsiError && err.status === 404) {
        throw new NotFoundError(`Location ${locationId} not found`);
      }
      throw err;
    }
  }
}
