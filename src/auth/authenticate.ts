/**
 * Build an {@link AuthProvider} from a declarative auth configuration.
 */

import { validateClientMetadata, type ClientMetadataInput } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { LocalCallbackListener } from '../handlers/local-callback-listener.js';
import type { AuthorizationHandler } from '../handlers/types.js';
import {
  OAuthClientProvider,
  type OAuthClientProviderOptions,
} from '../provider/oauth-client-provider.js';
import { ApiKeyAuthProvider, BearerAuthProvider } from './static-providers.js';

export type OAuthConfig = {
  type: 'oauth';
  clientMetadata: ClientMetadataInput;
  /** Defaults to a LocalCallbackListener on the first redirect URI */
  handler?: AuthorizationHandler;
} & Omit<OAuthClientProviderOptions, 'serverUrl' | 'clientMetadata' | 'handler'>;

export type ApiKeyConfig = {
  type: 'api_key';
  headerName: string;
  headerValue: string;
};

export type BearerAuthConfig = {
  type: 'bearer';
  token: string;
};

export type AuthConfig = OAuthConfig | ApiKeyConfig | BearerAuthConfig;

export type ConfiguredAuthProvider =
  | OAuthClientProvider
  | ApiKeyAuthProvider
  | BearerAuthProvider;

/**
 * Create the provider described by `config`.
 *
 * OAuth providers are returned unauthorized; the flow runs on first use.
 * The server URL only matters for OAuth discovery.
 */
export function createAuthProvider(
  config: OAuthConfig,
  serverUrl: string
): OAuthClientProvider;
export function createAuthProvider(
  config: ApiKeyConfig,
  serverUrl?: string
): ApiKeyAuthProvider;
export function createAuthProvider(
  config: BearerAuthConfig,
  serverUrl?: string
): BearerAuthProvider;
export function createAuthProvider(
  config: AuthConfig,
  serverUrl?: string
): ConfiguredAuthProvider;
export function createAuthProvider(
  config: AuthConfig,
  serverUrl?: string
): ConfiguredAuthProvider {
  switch (config.type) {
    case 'oauth': {
      if (!serverUrl) {
        throw new ConfigurationError('OAuth authentication needs a server URL', {
          stage: 'validate',
        });
      }
      const { type: _type, handler, clientMetadata, ...options } = config;
      const metadata = validateClientMetadata(clientMetadata);
      return new OAuthClientProvider({
        ...options,
        serverUrl,
        clientMetadata: metadata,
        handler:
          handler ??
          LocalCallbackListener.fromRedirectUri(metadata.redirect_uris[0], {
            logger: options.logger,
            timeoutMs: options.timeoutMs,
          }),
      });
    }
    case 'api_key':
      return new ApiKeyAuthProvider(config.headerName, config.headerValue);
    case 'bearer':
      return new BearerAuthProvider(config.token);
    default:
      return assertNever(config);
  }
}

/**
 * Async form of {@link createAuthProvider}.
 */
export async function authenticate(
  config: AuthConfig,
  serverUrl?: string
): Promise<ConfiguredAuthProvider> {
  return createAuthProvider(config, serverUrl);
}

function assertNever(config: never): never {
  throw new ConfigurationError(`Unsupported auth config: ${JSON.stringify(config)}`, {
    stage: 'validate',
  });
}
