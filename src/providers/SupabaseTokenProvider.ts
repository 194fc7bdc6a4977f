/**
 * Token provider backed by the esi_tokens table.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { TokenExpiredError, TokenInvalidError } from '../errors.js';
import type { EsiTokenRow } from '../types/database.js';
import type { ITokenProvider } from './ITokenProvider.js';

export class SupabaseTokenProvider implements ITokenProvider {
  constructor(private readonly db: SupabaseClient) {}

  async getToken(characterId: number, scopes: readonly string[]): Promise<string> {
    const { data, error } = await this.db
      .from('esi_tokens')
      .select('*')
      .eq('character_id', characterId)
      .order('expires_at', { ascending: false });

    if (error) throw new Error(`Failed to load tokens: ${error.message}`);
    return selectToken((data ?? []) as EsiTokenRow[], characterId, scopes);
  }
}

/**
 * Pick the token with the latest expiry among those that carry all scopes.
 * Shared with the in-memory provider used in tests.
 */
export function selectToken(
  rows: EsiTokenRow[],
  characterId: number,
  scopes: readonly string[],
  now: number = Date.now()
): string {
  const candidates = rows
    .filter((row) => row.character_id === characterId)
    .filter((row) => scopes.every((scope) => row.scopes.includes(scope)))
    .sort((a, b) => Date.parse(b.expires_at) - Date.parse(a.expires_at));

  const best = candidates[0];
  if (!best) {
    throw new TokenInvalidError(`No token with the required scopes for character ${characterId}`);
  }
  if (Date.parse(best.expires_at) <= now) {
    throw new TokenExpiredError(`Token for character ${characterId} has expired`);
  }
  return best.access_token;
}
