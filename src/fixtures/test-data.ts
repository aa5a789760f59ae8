/**
 * Consolidated test fixtures
 * Simple, focused test data for all test files
 */

import type {
  ClientCredentials,
  ClientMetadataInput,
  ServerMetadata,
} from '../config.js';
import type { TokenSet } from '../types.js';

// ============================================================================
// CLIENT AND SERVER DATA
// ============================================================================

export const clientMetadata = {
  client_name: 'Test Client',
  redirect_uris: ['http://localhost:3030/callback'],
  grant_types: ['authorization_code', 'refresh_token'],
  response_types: ['code'],
  token_endpoint_auth_method: 'none',
} satisfies ClientMetadataInput;

export const serverMetadata = {
  issuer: 'https://auth.example.com',
  authorization_endpoint: 'https://auth.example.com/authorize',
  token_endpoint: 'https://auth.example.com/token',
  registration_endpoint: 'https://auth.example.com/register',
  code_challenge_methods_supported: ['S256'],
} satisfies ServerMetadata;

export const credentials = {
  public: { client_id: 'test-client-id' },
  confidential: { client_id: 'test-client-id', client_secret: 'test-secret' },
} satisfies Record<string, ClientCredentials>;

export const registrationResponse = {
  client_id: 'registered-client-id',
  client_secret: 'test-secret',
  redirect_uris: ['http://localhost:3030/callback'],
  client_id_issued_at: 1_700_000_000,
};

// ============================================================================
// TOKEN RESPONSE DATA
// ============================================================================

export const tokenResponses = {
  minimal: { access_token: 'tok1', expires_in: 3600 },

  withRefresh: {
    access_token: 'tok1',
    token_type: 'Bearer',
    refresh_token: 'refresh-1',
    expires_in: 3600,
    scope: 'read,write',
  },

  refreshed: { access_token: 'tok2', expires_in: 3600 },
};

/**
 * Token set already past its expiry at `now`.
 */
export function expiredTokenSet(now: number, refreshToken?: string): TokenSet {
  const tokens: TokenSet = {
    accessToken: 'stale-token',
    tokenType: 'Bearer',
    issuedAt: now - 7_200_000,
    expiresIn: 3600,
    expiresAt: now - 3_600_000,
  };
  if (refreshToken) tokens.refreshToken = refreshToken;
  return tokens;
}

/**
 * Token set valid for another hour at `now`.
 */
export function freshTokenSet(now: number): TokenSet {
  return {
    accessToken: 'cached-token',
    tokenType: 'Bearer',
    refreshToken: 'refresh-1',
    issuedAt: now,
    expiresIn: 3600,
    expiresAt: now + 3_600_000,
  };
}

// ============================================================================
// ERROR TEST DATA
// ============================================================================

export const errorData = {
  invalidGrant: {
    statusCode: 400,
    error: 'invalid_grant',
    error_description: 'Refresh token revoked',
  },

  rateLimited: {
    status: 429,
    statusText: 'Too Many Requests',
  },

  connectionRefused(): TypeError {
    return new TypeError('fetch failed', {
      cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), {
        code: 'ECONNREFUSED',
      }),
    });
  },
};

// ============================================================================
// MODULE EXPORT DATA
// ============================================================================

export const moduleData = {
  expectedVersion: '0.1.0',
  expectedExports: [
    'version',
    'OAuthClientProvider',
    'InMemoryTokenStore',
    'LocalCallbackListener',
    'ConsoleAuthorizationHandler',
    'ExternalAuthorizationHandler',
    'MultiServerAuthBinder',
    'ApiKeyAuthProvider',
    'BearerAuthProvider',
    'getAuthHeaders',
    'createAuthProvider',
    'authenticate',
    'fromEnvironment',
    'ProviderState',
    'OAuthError',
    'ConfigurationError',
    'CallbackError',
    'TimeoutError',
    'CancellationError',
    'NetworkError',
    'ServerError',
    'MultiServerConnectionError',
    'ErrorNormalizer',
    'DefaultLogger',
    'createLogger',
    'LogLevel',
  ],
};
