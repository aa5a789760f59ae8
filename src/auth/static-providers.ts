/**
 * Providers for endpoints authenticated by a fixed credential.
 */

import { ConfigurationError } from '../errors.js';
import type { AuthProvider, RequestOptions } from '../types.js';

/** RFC 9110 field-name token */
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Sends an API key in a named request header.
 */
export class ApiKeyAuthProvider implements AuthProvider {
  constructor(
    readonly headerName: string,
    private readonly headerValue: string
  ) {
    if (!HEADER_NAME.test(headerName)) {
      throw new ConfigurationError(`Invalid API key header name: "${headerName}"`, {
        stage: 'validate',
      });
    }
    if (headerValue.length === 0) {
      throw new ConfigurationError('API key value must not be empty', {
        stage: 'validate',
      });
    }
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    return { [this.headerName]: this.headerValue };
  }
}

/**
 * Sends a static bearer token.
 */
export class BearerAuthProvider implements AuthProvider {
  constructor(private readonly token: string) {
    if (token.trim().length === 0) {
      throw new ConfigurationError('Bearer token must not be empty', {
        stage: 'validate',
      });
    }
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${this.token}` };
  }
}

/**
 * Headers for one outbound request; no provider means no headers.
 */
export async function getAuthHeaders(
  provider: AuthProvider | null | undefined,
  options: RequestOptions = {}
): Promise<Record<string, string>> {
  return provider ? provider.getAuthHeaders(options) : {};
}
