/**
 * OAuth client provider for one protected endpoint.
 *
 * Drives discovery, dynamic registration, the authorization code flow with
 * PKCE and lazy refresh through an explicit state machine, and hands the
 * transport a bearer header on demand. All public operations that can move
 * the state are serialized per provider.
 */

import { timingSafeEqual } from 'node:crypto';
import {
  ServerMetadataSchema,
  validate,
  validateClientMetadata,
  type ClientCredentials,
  type ClientMetadata,
  type ClientMetadataInput,
  type ServerMetadata,
} from '../config.js';
import {
  CallbackError,
  ConfigurationError,
  OAuthError,
  ServerError,
} from '../errors.js';
import type { AuthorizationHandler, CallbackResult } from '../handlers/types.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import { InMemoryTokenStore } from '../storage/in-memory-token-store.js';
import type { TokenStore } from '../storage/types.js';
import {
  ProviderState,
  type AuthProvider,
  type AuthorizationAttempt,
  type RefreshPolicy,
  type RequestOptions,
  type TokenSet,
} from '../types.js';
import { abortReason } from '../utils/abort.js';
import { withDeadline } from '../utils/deadline.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { ResilienceManager } from '../utils/resilience-manager.js';
import { SerialLock } from '../utils/serial-lock.js';
import { assertSupportsS256, discoverServerMetadata } from './discovery.js';
import { createAuthorizationAttempt } from './pkce.js';
import { registerClient } from './registration.js';
import {
  TokenExchangeService,
  type TokenEndpointClient,
} from './token-exchange.js';
import { isTokenSetExpired } from './token-set.js';

export const DEFAULT_AUTHORIZATION_TIMEOUT_MS = 300_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_EXPIRY_SAFETY_MARGIN_MS = 30_000;

export const DEFAULT_REFRESH_POLICY: Readonly<RefreshPolicy> = Object.freeze({
  retryableErrors: ['temporarily_unavailable', 'slow_down'],
  maxRetries: ResilienceManager.DEFAULT_MAX_RETRIES,
  backoffMs: ResilienceManager.DEFAULT_BACKOFF_MS,
  onFailure: 'reauthorize',
});

/**
 * Legal state transitions. `failed` is left only through {@link OAuthClientProvider.reset}.
 */
export const TRANSITIONS: Readonly<Record<ProviderState, readonly ProviderState[]>> = {
  [ProviderState.Unregistered]: [ProviderState.Registered, ProviderState.Failed],
  [ProviderState.Registered]: [
    ProviderState.AwaitingAuthorization,
    ProviderState.Authorized,
    ProviderState.Refreshing,
    ProviderState.Failed,
  ],
  [ProviderState.AwaitingAuthorization]: [ProviderState.Exchanging, ProviderState.Failed],
  [ProviderState.Exchanging]: [ProviderState.Authorized, ProviderState.Failed],
  [ProviderState.Authorized]: [
    ProviderState.Refreshing,
    ProviderState.Registered,
    ProviderState.Failed,
  ],
  [ProviderState.Refreshing]: [
    ProviderState.Authorized,
    ProviderState.Registered,
    ProviderState.Failed,
  ],
  [ProviderState.Failed]: [ProviderState.Unregistered],
};

export type StateChangeListener = (
  state: ProviderState,
  previous: ProviderState
) => void;

export interface OAuthClientProviderOptions {
  /** URL of the protected endpoint; discovery runs against its origin */
  serverUrl: string;
  /** Registration intent; validated at construction */
  clientMetadata: ClientMetadataInput;
  /** Interactive step of the flow */
  handler: AuthorizationHandler;
  /** Credential holder (default: a fresh InMemoryTokenStore) */
  store?: TokenStore;
  /** Static server metadata; skips discovery */
  serverMetadata?: ServerMetadata;
  /** Requested scope (default: `clientMetadata.scope`) */
  scope?: string;
  /** Extra authorization URL parameters; protocol parameters win */
  additionalParameters?: Record<string, string>;
  /** Deadline of one interactive authorization (default: 300000) */
  timeoutMs?: number;
  /** Deadline of each HTTP request (default: 30000) */
  requestTimeoutMs?: number;
  /** Tokens are treated as expired this long before `expiresAt` (default: 30000) */
  expirySafetyMarginMs?: number;
  /** Reject callbacks without a `state` parameter (default: true) */
  requireState?: boolean;
  refreshPolicy?: Partial<RefreshPolicy>;
  onStateChange?: StateChangeListener;
  logger?: Logger;
  /** Clock, epoch milliseconds */
  now?: () => number;
}

export class OAuthClientProvider implements AuthProvider {
  readonly serverUrl: string;
  readonly clientMetadata: Readonly<ClientMetadata>;

  private readonly handler: AuthorizationHandler;
  private readonly store: TokenStore;
  private readonly staticMetadata?: ServerMetadata;
  private readonly scope?: string;
  private readonly additionalParameters: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly safetyMarginMs: number;
  private readonly requireState: boolean;
  private readonly refreshPolicy: RefreshPolicy;
  private readonly onStateChange?: StateChangeListener;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly lock = new SerialLock();

  private currentState = ProviderState.Unregistered;
  private error?: OAuthError;
  private metadata?: ServerMetadata;

  constructor(options: OAuthClientProviderOptions) {
    this.serverUrl = parseServerUrl(options.serverUrl);
    this.clientMetadata = validateClientMetadata(options.clientMetadata);
    this.handler = options.handler;
    this.store = options.store ?? new InMemoryTokenStore();
    this.scope = options.scope ?? this.clientMetadata.scope;
    this.additionalParameters = { ...options.additionalParameters };
    this.timeoutMs = positive(
      options.timeoutMs ?? DEFAULT_AUTHORIZATION_TIMEOUT_MS,
      'timeoutMs'
    );
    this.requestTimeoutMs = positive(
      options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      'requestTimeoutMs'
    );
    this.safetyMarginMs =
      options.expirySafetyMarginMs ?? DEFAULT_EXPIRY_SAFETY_MARGIN_MS;
    this.requireState = options.requireState ?? true;
    this.refreshPolicy = { ...DEFAULT_REFRESH_POLICY, ...options.refreshPolicy };
    this.onStateChange = options.onStateChange;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger({})).child({
      component: 'OAuthClientProvider',
      serverUrl: this.serverUrl,
    });

    if (options.serverMetadata) {
      this.staticMetadata = validate(
        ServerMetadataSchema,
        options.serverMetadata,
        'server metadata'
      );
      assertSupportsS256(this.staticMetadata);
    }
  }

  get state(): ProviderState {
    return this.currentState;
  }

  /** Failure that moved the provider to `failed`, if any */
  get lastError(): OAuthError | undefined {
    return this.error;
  }

  /**
   * A usable access token: the stored one while valid, a refreshed one when
   * it expired, otherwise the result of a full authorization.
   */
  getAccessToken(options: RequestOptions = {}): Promise<string> {
    return this.guarded(options.signal, async (signal) => {
      const tokens = await this.ensureTokens(signal);
      return tokens.accessToken;
    });
  }

  async getAuthHeaders(options: RequestOptions = {}): Promise<Record<string, string>> {
    const accessToken = await this.getAccessToken(options);
    return { Authorization: `Bearer ${accessToken}` };
  }

  /**
   * Run a full authorization now, discarding the current token set.
   */
  authorize(options: RequestOptions = {}): Promise<TokenSet> {
    return this.guarded(options.signal, async (signal) => {
      const metadata = await this.resolveMetadata(signal);
      const credentials = await this.ensureRegistered(metadata, signal);
      await this.discardTokens();
      return this.runAuthorization(metadata, credentials, signal);
    });
  }

  /**
   * Drop the stored token set, e.g. after the resource server answered 401.
   * The next {@link getAccessToken} refreshes nothing and re-authorizes.
   */
  invalidateTokens(): Promise<void> {
    return this.lock.run(async () => {
      this.logger.info('Invalidating stored tokens');
      await this.discardTokens();
    });
  }

  /**
   * Leave `failed` and start a new lifecycle. Stored credentials and tokens
   * are kept; discovery runs again unless metadata was supplied.
   */
  reset(): Promise<void> {
    return this.lock.run(async () => {
      if (this.currentState !== ProviderState.Failed) return;
      this.error = undefined;
      this.metadata = undefined;
      this.moveTo(ProviderState.Unregistered);
    });
  }

  getTokens(): Promise<TokenSet | undefined> {
    return this.store.getTokens();
  }

  /**
   * Serialize `operation` and move to `failed` on any error it raises.
   */
  private guarded<T>(
    signal: AbortSignal | undefined,
    operation: (signal: AbortSignal | undefined) => Promise<T>
  ): Promise<T> {
    return this.lock.run(async () => {
      if (this.currentState === ProviderState.Failed) {
        throw new ConfigurationError(
          `Provider failed earlier (${this.error?.message ?? 'unknown error'}); call reset() first`,
          { stage: 'state', cause: this.error }
        );
      }
      try {
        return await operation(signal);
      } catch (error) {
        throw this.fail(error, signal);
      }
    });
  }

  private fail(error: unknown, signal: AbortSignal | undefined): OAuthError {
    const normalized =
      signal?.aborted && !(error instanceof OAuthError)
        ? abortReason(signal, this.currentState)
        : ErrorNormalizer.normalizeError(error, { issuer: this.metadata?.issuer });

    this.error = normalized;
    this.logger.error('OAuth flow failed', {
      ...normalized.toLogMeta(),
      state: this.currentState,
    });
    this.moveTo(ProviderState.Failed);
    return normalized;
  }

  private moveTo(next: ProviderState): void {
    const previous = this.currentState;
    if (previous === next) return;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new ConfigurationError(
        `Illegal provider state transition ${previous} -> ${next}`,
        { stage: 'state' }
      );
    }

    this.currentState = next;
    this.logger.debug('Provider state changed', { from: previous, to: next });
    try {
      this.onStateChange?.(next, previous);
    } catch (error) {
      this.logger.warn('State change listener threw', {
        from: previous,
        to: next,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async ensureTokens(signal?: AbortSignal): Promise<TokenSet> {
    const metadata = await this.resolveMetadata(signal);
    const credentials = await this.ensureRegistered(metadata, signal);

    const stored = await this.store.getTokens();
    if (stored && !this.isExpired(stored)) {
      this.moveTo(ProviderState.Authorized);
      return stored;
    }

    if (stored?.refreshToken) {
      const refreshed = await this.refresh(metadata, credentials, signal);
      if (refreshed) return refreshed;
    } else if (stored) {
      this.logger.info('Access token expired and no refresh token was issued');
      await this.discardTokens();
    }

    return this.runAuthorization(metadata, credentials, signal);
  }

  private async resolveMetadata(signal?: AbortSignal): Promise<ServerMetadata> {
    if (this.metadata) return this.metadata;

    const metadata =
      this.staticMetadata ??
      (await discoverServerMetadata(this.serverUrl, {
        logger: this.logger,
        requestTimeoutMs: this.requestTimeoutMs,
        signal,
      }));
    assertSupportsS256(metadata);
    this.metadata = metadata;
    return metadata;
  }

  private async ensureRegistered(
    metadata: ServerMetadata,
    signal?: AbortSignal
  ): Promise<ClientCredentials> {
    const credentials = await this.store.runExclusive(async () => {
      const existing = await this.store.getClientCredentials();
      if (existing) return existing;

      const registered = await registerClient(metadata, this.clientMetadata, {
        logger: this.logger,
        requestTimeoutMs: this.requestTimeoutMs,
        signal,
      });
      await this.store.setClientCredentials(registered);
      return registered;
    });

    if (this.currentState === ProviderState.Unregistered) {
      this.moveTo(ProviderState.Registered);
    }
    return credentials;
  }

  /**
   * Refresh under the store lock. Resolves undefined when the caller must
   * fall back to a full authorization.
   */
  private async refresh(
    metadata: ServerMetadata,
    credentials: ClientCredentials,
    signal?: AbortSignal
  ): Promise<TokenSet | undefined> {
    this.moveTo(ProviderState.Refreshing);
    const policy = this.refreshPolicy;

    const tokens = await this.store.runExclusive(async () => {
      const current = await this.store.getTokens();
      if (current && !this.isExpired(current)) {
        this.logger.debug('Tokens were refreshed concurrently');
        return current;
      }
      const refreshToken = current?.refreshToken;
      if (!refreshToken) return undefined;

      let refreshed: TokenSet;
      try {
        refreshed = await ResilienceManager.executeWithRetry(
          () =>
            this.tokenService(metadata).refreshToken(
              this.tokenClient(credentials),
              refreshToken,
              signal
            ),
          {
            maxRetries: policy.maxRetries,
            backoffMs: policy.backoffMs,
            shouldRetry: (error) =>
              error instanceof ServerError &&
              policy.retryableErrors.includes(error.error),
            onRetry: (error, attempt, waitMs) => {
              this.logger.warn('Retrying token refresh', {
                attempt: attempt + 1,
                waitMs,
                error: error instanceof Error ? error.message : String(error),
              });
            },
            signal,
          }
        );
      } catch (error) {
        if (!(error instanceof ServerError) || policy.onFailure === 'fail') {
          throw error;
        }
        this.logger.warn('Token refresh rejected; starting a new authorization', {
          ...error.toLogMeta(),
        });
        await this.store.setTokens(undefined);
        return undefined;
      }
      await this.store.setTokens(refreshed);
      return refreshed;
    });

    if (tokens) {
      this.moveTo(ProviderState.Authorized);
      return tokens;
    }
    this.moveTo(ProviderState.Registered);
    return undefined;
  }

  private async runAuthorization(
    metadata: ServerMetadata,
    credentials: ClientCredentials,
    signal?: AbortSignal
  ): Promise<TokenSet> {
    const redirectUri = this.clientMetadata.redirect_uris[0];
    const attempt = await createAuthorizationAttempt(
      {
        authorizationEndpoint: metadata.authorization_endpoint,
        clientId: credentials.client_id,
        redirectUri,
        scope: this.scope,
        additionalParameters: this.additionalParameters,
      },
      this.now() + this.timeoutMs
    );

    this.moveTo(ProviderState.AwaitingAuthorization);
    this.logger.info('Waiting for authorization', {
      endpoint: metadata.authorization_endpoint,
      timeoutMs: this.timeoutMs,
    });

    let callback: CallbackResult;
    try {
      callback = await withDeadline(
        async (attemptSignal) => {
          await this.handler.present(attempt.authorizationUrl, { signal: attemptSignal });
          return this.handler.collect({ signal: attemptSignal });
        },
        {
          timeoutMs: this.timeoutMs,
          signal,
          stage: 'authorize',
          endpoint: metadata.authorization_endpoint,
        }
      );
    } finally {
      await this.closeHandler();
    }

    this.verifyState(attempt, callback);
    this.moveTo(ProviderState.Exchanging);

    const tokens = await this.tokenService(metadata).exchangeCode(
      this.tokenClient(credentials),
      { code: callback.code, codeVerifier: attempt.codeVerifier, redirectUri },
      signal
    );
    await this.store.setTokens(tokens);
    this.moveTo(ProviderState.Authorized);
    return tokens;
  }

  private verifyState(attempt: AuthorizationAttempt, callback: CallbackResult): void {
    if (callback.state === undefined) {
      if (!this.requireState) return;
      throw new CallbackError(
        'missing_state',
        'Authorization callback did not include the state parameter',
        { stage: 'callback' }
      );
    }
    if (!sameSecret(callback.state, attempt.state)) {
      throw new CallbackError(
        'state_mismatch',
        'Authorization callback state does not match the request',
        { stage: 'callback' }
      );
    }
  }

  private async closeHandler(): Promise<void> {
    try {
      await this.handler.close?.();
    } catch (error) {
      this.logger.warn('Authorization handler failed to close', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async discardTokens(): Promise<void> {
    await this.store.setTokens(undefined);
    if (this.currentState === ProviderState.Authorized) {
      this.moveTo(ProviderState.Registered);
    }
  }

  private isExpired(tokens: TokenSet): boolean {
    return isTokenSetExpired(tokens, this.now(), this.safetyMarginMs);
  }

  private tokenService(metadata: ServerMetadata): TokenExchangeService {
    return new TokenExchangeService({
      metadata,
      logger: this.logger,
      requestTimeoutMs: this.requestTimeoutMs,
      requestedScope: this.scope,
      now: this.now,
    });
  }

  private tokenClient(credentials: ClientCredentials): TokenEndpointClient {
    const client: TokenEndpointClient = {
      clientId: credentials.client_id,
      authMethod: this.clientMetadata.token_endpoint_auth_method,
    };
    if (credentials.client_secret) client.clientSecret = credentials.client_secret;
    return client;
  }
}

function sameSecret(received: string, expected: string): boolean {
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function parseServerUrl(serverUrl: string): string {
  try {
    return new URL(serverUrl).href;
  } catch (error) {
    throw new ConfigurationError(`Invalid server URL: ${serverUrl}`, {
      stage: 'validate',
      cause: error,
    });
  }
}

function positive(value: number, name: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number`, {
      stage: 'validate',
    });
  }
  return value;
}
