/**
 * Token endpoint operations: authorization-code and refresh-token grants.
 */

import {
  RawTokenResponseSchema,
  formatIssues,
  type RawTokenResponse,
  type ServerMetadata,
  type TokenEndpointAuthMethod,
} from '../config.js';
import { OAuthError, ServerError } from '../errors.js';
import type { Logger } from '../logging/types.js';
import type { TokenSet } from '../types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { fetchJson } from './http.js';
import { toTokenSet } from './token-set.js';

/**
 * How the client identifies itself at the token endpoint.
 */
export interface TokenEndpointClient {
  clientId: string;
  clientSecret?: string;
  authMethod: TokenEndpointAuthMethod;
}

export interface TokenExchangeOptions {
  metadata: ServerMetadata;
  logger: Logger;
  /** Per-request deadline */
  requestTimeoutMs: number;
  /** Scope requested at authorization, used when the server reports none */
  requestedScope?: string;
  now?: () => number;
}

export interface CodeExchange {
  code: string;
  codeVerifier: string;
  redirectUri: string;
}

type TokenStage = 'exchangeCode' | 'refreshToken';

/**
 * Token exchange service for the authorization-code flow.
 */
export class TokenExchangeService {
  private readonly metadata: ServerMetadata;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: TokenExchangeOptions) {
    this.metadata = options.metadata;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Exchange an authorization code (plus its PKCE verifier) for tokens.
   */
  async exchangeCode(
    client: TokenEndpointClient,
    exchange: CodeExchange,
    signal?: AbortSignal
  ): Promise<TokenSet> {
    const raw = await this.requestTokens(
      'exchangeCode',
      client,
      {
        grant_type: 'authorization_code',
        code: exchange.code,
        code_verifier: exchange.codeVerifier,
        redirect_uri: exchange.redirectUri,
      },
      signal
    );
    return toTokenSet(raw, this.now(), {
      requestedScope: this.options.requestedScope,
    });
  }

  /**
   * Redeem a refresh token. A response without a new refresh token keeps
   * the one that was redeemed.
   */
  async refreshToken(
    client: TokenEndpointClient,
    refreshToken: string,
    signal?: AbortSignal
  ): Promise<TokenSet> {
    const raw = await this.requestTokens(
      'refreshToken',
      client,
      { grant_type: 'refresh_token', refresh_token: refreshToken },
      signal
    );
    return toTokenSet(raw, this.now(), {
      previousRefreshToken: refreshToken,
      requestedScope: this.options.requestedScope,
    });
  }

  private async requestTokens(
    stage: TokenStage,
    client: TokenEndpointClient,
    grant: Record<string, string>,
    signal?: AbortSignal
  ): Promise<RawTokenResponse> {
    const endpoint = this.metadata.token_endpoint;
    const issuer = this.metadata.issuer;
    const context = { stage, issuer, endpoint };

    this.logger.info(
      stage === 'exchangeCode'
        ? 'Exchanging authorization code for tokens'
        : 'Refreshing access token',
      context
    );

    try {
      const { params, headers } = authenticateClient(client, grant);
      const response = await fetchJson(
        endpoint,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
            ...headers,
          },
          body: params.toString(),
        },
        { stage, issuer, timeoutMs: this.options.requestTimeoutMs, signal }
      );

      if (!response.ok) {
        throw ErrorNormalizer.fromResponseBody(response.status, response.body, context);
      }

      const parsed = RawTokenResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new ServerError(
          response.status,
          'server_error',
          `Invalid token response: ${formatIssues(parsed.error)}`,
          { ...context, cause: parsed.error }
        );
      }

      this.logger.info(
        stage === 'exchangeCode'
          ? 'Authorization code exchange completed'
          : 'Token refresh completed',
        {
          ...context,
          hasRefreshToken: Boolean(parsed.data.refresh_token),
          expiresIn: parsed.data.expires_in,
        }
      );
      return parsed.data;
    } catch (error) {
      const normalized =
        error instanceof OAuthError
          ? error
          : ErrorNormalizer.normalizeError(error, context);
      this.logger.error(
        stage === 'exchangeCode'
          ? 'Authorization code exchange failed'
          : 'Token refresh failed',
        normalized.toLogMeta()
      );
      throw normalized;
    }
  }
}

/**
 * Apply the client authentication method to a token request.
 *
 * `client_secret_basic` sends the credentials in an Authorization header
 * (RFC 6749 section 2.3.1, form-encoded before base64); every other method
 * sends `client_id` in the body, plus `client_secret` when there is one.
 */
export function authenticateClient(
  client: TokenEndpointClient,
  grant: Record<string, string>
): { params: URLSearchParams; headers: Record<string, string> } {
  const params = new URLSearchParams(grant);

  if (client.authMethod === 'client_secret_basic' && client.clientSecret) {
    const credentials = `${encodeURIComponent(client.clientId)}:${encodeURIComponent(client.clientSecret)}`;
    return {
      params,
      headers: {
        Authorization: `Basic ${Buffer.from(credentials).toString('base64')}`,
      },
    };
  }

  params.set('client_id', client.clientId);
  if (client.clientSecret) {
    params.set('client_secret', client.clientSecret);
  }
  return { params, headers: {} };
}
