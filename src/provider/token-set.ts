import type { RawTokenResponse } from '../config.js';
import type { TokenSet } from '../types.js';

/**
 * Normalize a scope string: comma- or space-delimited in, space-delimited out.
 * Falls back to the requested scope when the server did not report one.
 */
export function normalizeScope(
  providerScope: string | undefined,
  requestedScope?: string
): string | undefined {
  const scopes = (value: string | undefined): string[] =>
    (value ?? '').split(/[,\s]+/).filter((scope) => scope.length > 0);

  const granted = scopes(providerScope);
  if (granted.length > 0) return granted.join(' ');

  const requested = scopes(requestedScope);
  return requested.length > 0 ? requested.join(' ') : undefined;
}

export interface TokenSetOptions {
  /** Kept when the response carries no refresh token of its own */
  previousRefreshToken?: string;
  requestedScope?: string;
}

/**
 * Convert a token endpoint response into a {@link TokenSet} issued at
 * `issuedAt` (epoch milliseconds).
 */
export function toTokenSet(
  raw: RawTokenResponse,
  issuedAt: number,
  options: TokenSetOptions = {}
): TokenSet {
  const tokens: TokenSet = {
    accessToken: raw.access_token,
    tokenType:
      raw.token_type && raw.token_type.toLowerCase() !== 'bearer'
        ? raw.token_type
        : 'Bearer',
    issuedAt,
  };

  const refreshToken = raw.refresh_token ?? options.previousRefreshToken;
  if (refreshToken) tokens.refreshToken = refreshToken;

  if (raw.expires_in !== undefined) {
    tokens.expiresIn = raw.expires_in;
    tokens.expiresAt = issuedAt + raw.expires_in * 1000;
  }

  const scope = normalizeScope(raw.scope, options.requestedScope);
  if (scope) tokens.scope = scope;

  return tokens;
}

/**
 * Whether `tokens` must not be handed out at `now`. Tokens without expiry
 * information never expire on their own.
 */
export function isTokenSetExpired(
  tokens: TokenSet,
  now: number,
  safetyMarginMs: number
): boolean {
  return tokens.expiresAt !== undefined && now >= tokens.expiresAt - safetyMarginMs;
}
