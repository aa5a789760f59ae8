import { StatusCodes } from 'http-status-codes';
import {
  ServerMetadataSchema,
  formatIssues,
  type ServerMetadata,
} from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logging/types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { fetchJson } from './http.js';

/** Discovery documents tried in order, relative to the server origin */
export const WELL_KNOWN_PATHS = [
  '/.well-known/oauth-authorization-server',
  '/.well-known/openid-configuration',
] as const;

export interface DiscoveryOptions {
  logger: Logger;
  requestTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Resolve authorization server metadata for `serverUrl`.
 *
 * Servers that publish no discovery document at all (every candidate answers
 * 404) get the conventional `/authorize`, `/token` and `/register` endpoints
 * on their origin.
 */
export async function discoverServerMetadata(
  serverUrl: string,
  options: DiscoveryOptions
): Promise<ServerMetadata> {
  const { logger, requestTimeoutMs, signal } = options;
  const origin = new URL(serverUrl).origin;

  for (const path of WELL_KNOWN_PATHS) {
    const url = `${origin}${path}`;
    logger.debug('Fetching authorization server metadata', { endpoint: url });

    const response = await fetchJson(
      url,
      { method: 'GET', headers: { Accept: 'application/json' } },
      { stage: 'discover', timeoutMs: requestTimeoutMs, signal }
    );

    if (response.status === StatusCodes.NOT_FOUND) continue;
    if (!response.ok) {
      throw ErrorNormalizer.fromResponseBody(response.status, response.body, {
        stage: 'discover',
        endpoint: url,
      });
    }

    const parsed = ServerMetadataSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid authorization server metadata at ${url}: ${formatIssues(parsed.error)}`,
        { stage: 'discover', endpoint: url, cause: parsed.error }
      );
    }

    logger.info('Discovered authorization server metadata', {
      endpoint: url,
      issuer: parsed.data.issuer,
    });
    return parsed.data;
  }

  logger.warn('No authorization server metadata published; using default endpoints', {
    issuer: origin,
  });
  return defaultServerMetadata(origin);
}

export function defaultServerMetadata(origin: string): ServerMetadata {
  return {
    issuer: origin,
    authorization_endpoint: `${origin}/authorize`,
    token_endpoint: `${origin}/token`,
    registration_endpoint: `${origin}/register`,
  };
}

/**
 * Reject servers that advertise PKCE methods without S256.
 */
export function assertSupportsS256(metadata: ServerMetadata): void {
  const methods = metadata.code_challenge_methods_supported;
  if (methods && !methods.includes('S256')) {
    throw new ConfigurationError(
      `Authorization server does not support the S256 code challenge method (supports: ${methods.join(', ') || 'none'})`,
      { stage: 'discover', issuer: metadata.issuer }
    );
  }
}
