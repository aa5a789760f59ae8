/**
 * Environment variable helper for OAuthClientProvider.
 *
 * Maps an explicitly passed environment record onto provider options:
 * - OAUTH_CALLBACK_PORT -> port of the default redirect URI and callback listener
 * - OAUTH_TIMEOUT_SECONDS -> authorization timeout
 * - OAUTH_CLIENT_ID / OAUTH_CLIENT_SECRET -> pre-seeded client credentials
 * - OAUTH_SCOPE -> requested scope (spaces or commas)
 * - OAUTH_LOG_LEVEL -> level of the default logger
 */

import {
  EnvironmentSettingsSchema,
  validate,
  type ClientMetadataInput,
  type EnvironmentSettings,
} from './config.js';
import { ConfigurationError } from './errors.js';
import { LocalCallbackListener } from './handlers/local-callback-listener.js';
import type { AuthorizationHandler } from './handlers/types.js';
import { createLogger, parseLogLevel } from './logging/logger.js';
import type { Logger } from './logging/types.js';
import {
  OAuthClientProvider,
  type OAuthClientProviderOptions,
} from './provider/oauth-client-provider.js';
import { normalizeScope } from './provider/token-set.js';
import { InMemoryTokenStore } from './storage/in-memory-token-store.js';

const DEFAULT_CALLBACK_PORT = 3030;

export interface FromEnvironmentOptions
  extends Omit<
    OAuthClientProviderOptions,
    'clientMetadata' | 'handler' | 'logger'
  > {
  /** Environment record; never read from process.env implicitly */
  env: Record<string, string | undefined>;
  /** Redirect URIs default to http://localhost:<OAUTH_CALLBACK_PORT>/callback */
  clientMetadata: Omit<ClientMetadataInput, 'redirect_uris'> & {
    redirect_uris?: string[];
  };
  handler?: AuthorizationHandler;
  logger?: Logger;
}

/**
 * Create an OAuthClientProvider from environment settings.
 *
 * @throws ConfigurationError when a setting is malformed or the callback port
 * contradicts an explicit redirect URI
 */
export function fromEnvironment(options: FromEnvironmentOptions): OAuthClientProvider {
  const { env, clientMetadata, handler, logger, store, ...rest } = options;
  const settings = validate(EnvironmentSettingsSchema, env, 'environment');

  const redirectUris = clientMetadata.redirect_uris ?? [
    `http://localhost:${settings.OAUTH_CALLBACK_PORT ?? DEFAULT_CALLBACK_PORT}/callback`,
  ];
  assertPortMatches(settings, redirectUris);

  const timeoutMs =
    settings.OAUTH_TIMEOUT_SECONDS === undefined
      ? rest.timeoutMs
      : settings.OAUTH_TIMEOUT_SECONDS * 1000;
  const providerLogger = logger ?? defaultLogger(settings);

  return new OAuthClientProvider({
    ...rest,
    clientMetadata: { ...clientMetadata, redirect_uris: redirectUris },
    scope: normalizeScope(settings.OAUTH_SCOPE) ?? rest.scope,
    timeoutMs,
    logger: providerLogger,
    store: store ?? seededStore(settings),
    handler:
      handler ??
      LocalCallbackListener.fromRedirectUri(redirectUris[0], {
        logger: providerLogger,
        timeoutMs,
      }),
  });
}

function defaultLogger(settings: EnvironmentSettings): Logger {
  const raw = settings.OAUTH_LOG_LEVEL;
  const level = parseLogLevel(raw);
  if (raw !== undefined && level === undefined) {
    throw new ConfigurationError(`Unknown OAUTH_LOG_LEVEL: ${raw}`, {
      stage: 'validate',
    });
  }
  return createLogger({ component: 'oauth' }, level === undefined ? {} : { level });
}

function seededStore(settings: EnvironmentSettings): InMemoryTokenStore {
  const clientId = settings.OAUTH_CLIENT_ID;
  if (!clientId) {
    if (settings.OAUTH_CLIENT_SECRET) {
      throw new ConfigurationError('OAUTH_CLIENT_SECRET is set without OAUTH_CLIENT_ID', {
        stage: 'validate',
      });
    }
    return new InMemoryTokenStore();
  }
  return new InMemoryTokenStore({
    clientCredentials: settings.OAUTH_CLIENT_SECRET
      ? { client_id: clientId, client_secret: settings.OAUTH_CLIENT_SECRET }
      : { client_id: clientId },
  });
}

function assertPortMatches(settings: EnvironmentSettings, redirectUris: string[]): void {
  const port = settings.OAUTH_CALLBACK_PORT;
  if (port === undefined) return;

  let redirect: URL;
  try {
    redirect = new URL(redirectUris[0]);
  } catch (error) {
    throw new ConfigurationError(`Invalid redirect URI: ${redirectUris[0]}`, {
      stage: 'validate',
      cause: error,
    });
  }
  const redirectPort = redirect.port
    ? Number(redirect.port)
    : redirect.protocol === 'https:'
      ? 443
      : 80;
  if (redirectPort !== port) {
    throw new ConfigurationError(
      `OAUTH_CALLBACK_PORT ${port} does not match redirect URI ${redirectUris[0]}`,
      { stage: 'validate' }
    );
  }
}
