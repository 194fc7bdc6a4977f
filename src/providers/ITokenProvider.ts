/**
 * Source of ESI bearer tokens.
 * Refreshing tokens is out of scope: an external SSO component keeps the
 * token store current, this interface only hands out valid ones.
 */

export interface ITokenProvider {
  /**
   * Access token for the character covering every requested scope.
   * Throws TokenInvalidError when no such token exists and
   * TokenExpiredError when the best candidate has expired.
   */
  getToken(characterId: number, scopes: readonly string[]): Promise<string>;
}
