/**
 * Pairs a list of endpoints with their auth providers and opens every
 * session concurrently.
 */

import { getAuthHeaders } from '../auth/static-providers.js';
import { ConfigurationError, MultiServerConnectionError } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import type { AuthProvider, RequestOptions } from '../types.js';
import { abortReason, throwIfAborted } from '../utils/abort.js';
import { withDeadline } from '../utils/deadline.js';
import type {
  Connection,
  EndpointConnector,
  EndpointDescriptor,
  FailedConnection,
  MultiServerAuthBinderOptions,
} from './types.js';

export class MultiServerAuthBinder<C extends Connection = Connection> {
  private readonly endpoints: readonly EndpointDescriptor[];
  private readonly authProviders: ReadonlyArray<AuthProvider | null | undefined>;
  private readonly isolateFailures: boolean;
  private readonly onConnectionError?: (endpoint: EndpointDescriptor, error: Error) => void;
  private readonly connectTimeoutMs?: number;
  private readonly logger: Logger;

  private readonly established = new Map<string, C>();
  private failures: FailedConnection[] = [];

  /**
   * @param authProviders - Positional: entry `i` authenticates `endpoints[i]`;
   * `null` or `undefined` means unauthenticated
   */
  constructor(
    endpoints: readonly EndpointDescriptor[],
    authProviders: ReadonlyArray<AuthProvider | null | undefined>,
    private readonly connector: EndpointConnector<C>,
    options: MultiServerAuthBinderOptions = {}
  ) {
    if (authProviders.length !== endpoints.length) {
      throw new ConfigurationError(
        `Expected ${endpoints.length} auth provider entries, got ${authProviders.length}`,
        { stage: 'validate' }
      );
    }
    const seen = new Set<string>();
    for (const endpoint of endpoints) {
      if (seen.has(endpoint.name)) {
        throw new ConfigurationError(`Duplicate endpoint name: ${endpoint.name}`, {
          stage: 'validate',
        });
      }
      seen.add(endpoint.name);
    }
    if (options.connectTimeoutMs !== undefined && !(options.connectTimeoutMs > 0)) {
      throw new ConfigurationError('connectTimeoutMs must be a positive number', {
        stage: 'validate',
      });
    }

    this.endpoints = [...endpoints];
    this.authProviders = [...authProviders];
    this.isolateFailures = options.isolateFailures ?? false;
    this.onConnectionError = options.onConnectionError;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.logger =
      options.logger?.child({ component: 'MultiServerAuthBinder' }) ??
      createLogger({ component: 'MultiServerAuthBinder' });
  }

  /** Established sessions keyed by endpoint name, in endpoint order */
  get connections(): ReadonlyMap<string, C> {
    return this.established;
  }

  /** Failures recorded by the last {@link connectAll} */
  get failedConnections(): readonly FailedConnection[] {
    return this.failures;
  }

  /**
   * Authenticate and connect every endpoint concurrently.
   *
   * @throws MultiServerConnectionError listing every failed endpoint when a
   * required endpoint fails; sessions opened by this call are closed first
   */
  async connectAll(options: RequestOptions = {}): Promise<ReadonlyMap<string, C>> {
    if (this.established.size > 0) {
      throw new ConfigurationError('Endpoints are already connected; call closeAll() first', {
        stage: 'connect',
      });
    }
    this.failures = [];

    const results = await Promise.allSettled(
      this.endpoints.map((endpoint, index) =>
        this.connectOne(endpoint, this.authProviders[index], options.signal)
      )
    );

    const fatal: FailedConnection[] = [];
    results.forEach((result, index) => {
      const endpoint = this.endpoints[index];
      if (result.status === 'fulfilled') {
        this.established.set(endpoint.name, result.value);
        return;
      }
      const failure = { endpoint, error: toError(result.reason) };
      this.failures.push(failure);
      if (!this.isolateFailures && !endpoint.optional) fatal.push(failure);
    });

    if (fatal.length > 0) {
      this.logger.error('Connecting endpoints failed', {
        failed: this.failures.map((failure) => failure.endpoint.name),
      });
      await this.closeAll();
      throw new MultiServerConnectionError(
        this.failures.map((failure) => ({
          endpoint: failure.endpoint.name,
          error: failure.error,
        }))
      );
    }

    for (const failure of this.failures) {
      this.logger.warn('Endpoint unavailable; continuing without it', {
        endpoint: failure.endpoint.name,
        error: failure.error.message,
      });
      this.notifyConnectionError(failure);
    }

    this.logger.info('Endpoints connected', {
      connected: [...this.established.keys()],
      failed: this.failures.length,
    });
    return this.connections;
  }

  /**
   * Close every established session. Close failures are logged.
   */
  async closeAll(): Promise<void> {
    const open = [...this.established.entries()];
    this.established.clear();

    const results = await Promise.allSettled(open.map(([, connection]) => connection.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn('Closing connection failed', {
          endpoint: open[index][0],
          error: toError(result.reason).message,
        });
      }
    });
  }

  private connectOne(
    endpoint: EndpointDescriptor,
    authProvider: AuthProvider | null | undefined,
    signal?: AbortSignal
  ): Promise<C> {
    const attempt = async (taskSignal: AbortSignal): Promise<C> => {
      throwIfAborted(taskSignal, 'connect');
      const headers = await getAuthHeaders(authProvider, { signal: taskSignal });

      this.logger.debug('Connecting endpoint', {
        endpoint: endpoint.name,
        authenticated: Object.keys(headers).length > 0,
      });
      const connection = await this.connector(endpoint, {
        headers,
        authProvider: authProvider ?? undefined,
        signal: taskSignal,
      });

      if (taskSignal.aborted) {
        await this.closeLate(endpoint, connection);
        throw abortReason(taskSignal, 'connect');
      }
      return connection;
    };

    if (this.connectTimeoutMs === undefined) {
      return attempt(signal ?? new AbortController().signal);
    }
    return withDeadline(attempt, {
      timeoutMs: this.connectTimeoutMs,
      signal,
      stage: 'connect',
      endpoint: endpoint.url,
    });
  }

  private async closeLate(endpoint: EndpointDescriptor, connection: C): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.logger.warn('Closing abandoned connection failed', {
        endpoint: endpoint.name,
        error: toError(error).message,
      });
    }
  }

  private notifyConnectionError(failure: FailedConnection): void {
    try {
      this.onConnectionError?.(failure.endpoint, failure.error);
    } catch (error) {
      this.logger.warn('onConnectionError callback threw', {
        endpoint: failure.endpoint.name,
        error: toError(error).message,
      });
    }
  }
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
