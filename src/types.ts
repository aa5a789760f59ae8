/**
 * Lifecycle states of an {@link OAuthClientProvider}.
 */
export enum ProviderState {
  Unregistered = 'unregistered',
  Registered = 'registered',
  AwaitingAuthorization = 'awaiting_authorization',
  Exchanging = 'exchanging',
  Authorized = 'authorized',
  Refreshing = 'refreshing',
  Failed = 'failed',
}

/**
 * Issued credential material. Replaced as a whole on every refresh.
 */
export type TokenSet = {
  /** OAuth access token */
  accessToken: string;
  /** Token type, `Bearer` unless the server says otherwise */
  tokenType: string;
  /** Refresh token (if issued) */
  refreshToken?: string;
  /** Issuance time, epoch milliseconds */
  issuedAt: number;
  /** Lifetime in seconds as reported by the server */
  expiresIn?: number;
  /** Absolute expiry, epoch milliseconds */
  expiresAt?: number;
  /** Granted scopes, space-delimited */
  scope?: string;
};

/**
 * Ephemeral values of one authorization handshake. Owned by the call that
 * created it and never stored on the provider.
 */
export type AuthorizationAttempt = {
  state: string;
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: 'S256';
  redirectUri: string;
  authorizationUrl: string;
  /** Epoch milliseconds after which the attempt is abandoned */
  deadline: number;
};

/**
 * What to do when a refresh-token exchange is rejected by the server.
 */
export type RefreshPolicy = {
  /** Server error codes that earn a bounded retry before the fallback */
  retryableErrors: string[];
  /** Retries after the first refresh request */
  maxRetries: number;
  /** Base backoff between retries, doubled per retry */
  backoffMs: number;
  /**
   * `reauthorize` drops the stale token set and runs a full authorization;
   * `fail` surfaces the ServerError.
   */
  onFailure: 'reauthorize' | 'fail';
};

/**
 * Per-call options shared by every suspending operation.
 */
export type RequestOptions = {
  /** Caller cancellation */
  signal?: AbortSignal;
};

/**
 * Anything that can produce request headers for an outbound session. OAuth,
 * API-key and static bearer providers all implement it.
 */
export interface AuthProvider {
  getAuthHeaders(options?: RequestOptions): Promise<Record<string, string>>;
}
