/**
 * OAuth client authentication for sessions with protected endpoints.
 * Main entry point.
 */

export const version = '0.1.0';

// Provider state machine
export {
  OAuthClientProvider,
  DEFAULT_AUTHORIZATION_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_EXPIRY_SAFETY_MARGIN_MS,
  DEFAULT_REFRESH_POLICY,
} from './provider/oauth-client-provider.js';
export type {
  OAuthClientProviderOptions,
  StateChangeListener,
} from './provider/oauth-client-provider.js';
export { ProviderState } from './types.js';
export type {
  AuthProvider,
  AuthorizationAttempt,
  RefreshPolicy,
  RequestOptions,
  TokenSet,
} from './types.js';

// Storage
export { InMemoryTokenStore } from './storage/in-memory-token-store.js';
export type { InMemoryTokenStoreOptions } from './storage/in-memory-token-store.js';
export type { TokenStore } from './storage/types.js';

// Authorization handlers
export { LocalCallbackListener } from './handlers/local-callback-listener.js';
export type { LocalCallbackListenerOptions } from './handlers/local-callback-listener.js';
export { ConsoleAuthorizationHandler } from './handlers/console-handler.js';
export { ExternalAuthorizationHandler } from './handlers/external-handler.js';
export type { AuthorizationHandler, CallbackResult } from './handlers/types.js';

// Multi-endpoint binding
export { MultiServerAuthBinder } from './binder/multi-server-auth-binder.js';
export type {
  Connection,
  ConnectContext,
  EndpointConnector,
  EndpointDescriptor,
  FailedConnection,
  MultiServerAuthBinderOptions,
} from './binder/types.js';

// Static credentials and factories
export {
  ApiKeyAuthProvider,
  BearerAuthProvider,
  getAuthHeaders,
} from './auth/static-providers.js';
export { createAuthProvider, authenticate } from './auth/authenticate.js';
export type {
  AuthConfig,
  OAuthConfig,
  ApiKeyConfig,
  BearerAuthConfig,
  ConfiguredAuthProvider,
} from './auth/authenticate.js';
export { fromEnvironment } from './from-environment.js';
export type { FromEnvironmentOptions } from './from-environment.js';

// Configuration schemas
export type {
  ClientCredentials,
  ClientMetadata,
  ClientMetadataInput,
  ServerMetadata,
} from './config.js';

// Errors
export {
  OAuthError,
  ConfigurationError,
  CallbackError,
  TimeoutError,
  CancellationError,
  NetworkError,
  ServerError,
  MultiServerConnectionError,
  isOAuthError,
} from './errors.js';
export type { OAuthErrorKind, EndpointFailure } from './errors.js';
export { ErrorNormalizer } from './utils/error-normalizer.js';

// Logging
export { DefaultLogger, createLogger } from './logging/logger.js';
export { LogLevel } from './logging/types.js';
export type { Logger, LogMeta, LogTransport } from './logging/types.js';

export default {
  version,
};
