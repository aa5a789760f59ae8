import type { Logger } from '../logging/types.js';
import type { AuthProvider } from '../types.js';

/**
 * One protected endpoint the application talks to.
 */
export type EndpointDescriptor = {
  /** Unique name, used in logs and errors */
  name: string;
  url: string;
  /** A failure of this endpoint never fails the whole connect */
  optional?: boolean;
};

/**
 * Anything the connector opens that must be released later.
 */
export interface Connection {
  close(): Promise<void>;
}

export type ConnectContext = {
  /** Authentication headers for the session, empty when unauthenticated */
  headers: Record<string, string>;
  /** For transports that re-read headers later (after a 401, a refresh) */
  authProvider?: AuthProvider;
  signal: AbortSignal;
};

/**
 * Opens the session to one endpoint.
 */
export type EndpointConnector<C extends Connection> = (
  endpoint: EndpointDescriptor,
  context: ConnectContext
) => Promise<C>;

export type FailedConnection = {
  endpoint: EndpointDescriptor;
  error: Error;
};

export interface MultiServerAuthBinderOptions {
  /** Record failures instead of failing the whole connect (default: false) */
  isolateFailures?: boolean;
  /** Called for each failure that was recorded instead of thrown */
  onConnectionError?: (endpoint: EndpointDescriptor, error: Error) => void;
  /** Deadline of each endpoint's auth + connect */
  connectTimeoutMs?: number;
  logger?: Logger;
}
