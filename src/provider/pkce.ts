import {
  calculatePKCECodeChallenge,
  randomPKCECodeVerifier,
  randomState,
} from 'openid-client';
import type { AuthorizationAttempt } from '../types.js';

/**
 * Query parameters owned by the protocol; additional parameters cannot
 * override them.
 */
export const PROTOCOL_PARAMETERS: ReadonlySet<string> = new Set([
  'response_type',
  'client_id',
  'redirect_uri',
  'state',
  'code_challenge',
  'code_challenge_method',
  'scope',
]);

export interface AuthorizationRequest {
  authorizationEndpoint: string;
  clientId: string;
  redirectUri: string;
  scope?: string;
  additionalParameters?: Record<string, string>;
}

/**
 * Build the authorization URL. Query parameters already present on the
 * endpoint are kept.
 */
export function buildAuthorizationUrl(
  request: AuthorizationRequest,
  pkce: { state: string; codeChallenge: string }
): string {
  const url = new URL(request.authorizationEndpoint);
  const params = url.searchParams;

  params.set('response_type', 'code');
  params.set('client_id', request.clientId);
  params.set('redirect_uri', request.redirectUri);
  params.set('state', pkce.state);
  params.set('code_challenge', pkce.codeChallenge);
  params.set('code_challenge_method', 'S256');
  if (request.scope) {
    params.set('scope', request.scope);
  }

  for (const [key, value] of Object.entries(request.additionalParameters ?? {})) {
    if (!PROTOCOL_PARAMETERS.has(key)) {
      params.set(key, value);
    }
  }

  return url.toString();
}

/**
 * Fresh state token, PKCE S256 pair and authorization URL for one handshake.
 */
export async function createAuthorizationAttempt(
  request: AuthorizationRequest,
  deadline: number
): Promise<AuthorizationAttempt> {
  const state = randomState();
  const codeVerifier = randomPKCECodeVerifier();
  const codeChallenge = await calculatePKCECodeChallenge(codeVerifier);

  return {
    state,
    codeVerifier,
    codeChallenge,
    codeChallengeMethod: 'S256',
    redirectUri: request.redirectUri,
    authorizationUrl: buildAuthorizationUrl(request, { state, codeChallenge }),
    deadline,
  };
}
