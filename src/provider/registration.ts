import {
  ClientCredentialsSchema,
  formatIssues,
  type ClientCredentials,
  type ClientMetadata,
  type ServerMetadata,
} from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logging/types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { fetchJson } from './http.js';

export interface RegistrationOptions {
  logger: Logger;
  requestTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Dynamic client registration (RFC 7591).
 *
 * A 4xx answer is a rejection of the declared metadata and raises a
 * ConfigurationError; 5xx and transport failures keep their own class.
 */
export async function registerClient(
  server: ServerMetadata,
  clientMetadata: ClientMetadata,
  options: RegistrationOptions
): Promise<ClientCredentials> {
  const { logger, requestTimeoutMs, signal } = options;
  const endpoint = server.registration_endpoint;
  const context = { stage: 'register', issuer: server.issuer, endpoint };

  if (!endpoint) {
    throw new ConfigurationError(
      'Authorization server does not support dynamic client registration',
      context
    );
  }

  logger.info('Registering client', {
    ...context,
    clientName: clientMetadata.client_name,
  });

  const response = await fetchJson(
    endpoint,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(clientMetadata),
    },
    { stage: 'register', issuer: server.issuer, timeoutMs: requestTimeoutMs, signal }
  );

  if (!response.ok) {
    const serverError = ErrorNormalizer.fromResponseBody(
      response.status,
      response.body,
      context
    );
    if (response.status >= 500) throw serverError;
    throw new ConfigurationError(`Client registration rejected: ${serverError.message}`, {
      ...context,
      cause: serverError,
    });
  }

  const parsed = ClientCredentialsSchema.safeParse(response.body);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid registration response: ${formatIssues(parsed.error)}`,
      { ...context, cause: parsed.error }
    );
  }

  logger.info('Client registered', { ...context, clientId: parsed.data.client_id });
  return parsed.data;
}
