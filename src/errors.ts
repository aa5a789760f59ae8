import type { LogMeta } from './logging/types.js';

/**
 * Failure classes surfaced to callers. Each maps to a propagation policy:
 * configuration and cancellation are final, timeout and network are
 * candidates for a caller-level retry, server errors are final for the
 * current attempt.
 */
export type OAuthErrorKind =
  | 'configuration'
  | 'timeout'
  | 'cancellation'
  | 'network'
  | 'server';

/**
 * Where in the flow a failure happened.
 */
export interface OAuthErrorContext {
  /** Flow stage, e.g. `register`, `authorize`, `exchangeCode`, `refreshToken` */
  stage?: string;
  /** Endpoint URL or logical endpoint name */
  endpoint?: string;
  /** Authorization server issuer */
  issuer?: string;
  /** Underlying fault */
  cause?: unknown;
}

/**
 * Base class of every failure raised by this library.
 */
export abstract class OAuthError extends Error {
  abstract readonly kind: OAuthErrorKind;
  readonly stage?: string;
  readonly endpoint?: string;
  readonly issuer?: string;

  protected constructor(message: string, context: OAuthErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    if (context.stage !== undefined) this.stage = context.stage;
    if (context.endpoint !== undefined) this.endpoint = context.endpoint;
    if (context.issuer !== undefined) this.issuer = context.issuer;
  }

  /**
   * Structured fields for a log record; subclasses add their own.
   */
  toLogMeta(): LogMeta {
    const meta: LogMeta = {
      errorKind: this.kind,
      errorName: this.name,
      errorMessage: this.message,
    };
    if (this.stage !== undefined) meta.stage = this.stage;
    if (this.endpoint !== undefined) meta.endpoint = this.endpoint;
    if (this.issuer !== undefined) meta.issuer = this.issuer;
    if (this.cause !== undefined) {
      meta.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    }
    return meta;
  }
}

/**
 * Malformed metadata, rejected registration, unusable redirect URI, a callback
 * port that cannot be bound. Never retried.
 */
export class ConfigurationError extends OAuthError {
  readonly kind = 'configuration' as const;

  constructor(message: string, context: OAuthErrorContext = {}) {
    super(message, context);
  }
}

export type CallbackFailureReason =
  | 'invalid_redirect'
  | 'missing_code'
  | 'missing_state'
  | 'state_mismatch';

/**
 * The authorization callback arrived but cannot be trusted or used.
 */
export class CallbackError extends ConfigurationError {
  readonly reason: CallbackFailureReason;

  constructor(
    reason: CallbackFailureReason,
    message: string,
    context: OAuthErrorContext = {}
  ) {
    super(message, context);
    this.reason = reason;
  }

  override toLogMeta(): LogMeta {
    return { ...super.toLogMeta(), reason: this.reason };
  }
}

/**
 * A bounded wait exceeded its deadline.
 */
export class TimeoutError extends OAuthError {
  readonly kind = 'timeout' as const;
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context: OAuthErrorContext = {}) {
    super(message, context);
    this.timeoutMs = timeoutMs;
  }

  override toLogMeta(): LogMeta {
    return { ...super.toLogMeta(), timeoutMs: this.timeoutMs };
  }
}

/**
 * The authorizing party declined, or the caller aborted the attempt.
 */
export class CancellationError extends OAuthError {
  readonly kind = 'cancellation' as const;
  /** Server-reported error code (`access_denied`) or `aborted` */
  readonly error: string;
  readonly errorDescription?: string;

  constructor(
    error: string,
    errorDescription?: string,
    context: OAuthErrorContext = {}
  ) {
    super(
      errorDescription
        ? `Authorization cancelled: ${error} (${errorDescription})`
        : `Authorization cancelled: ${error}`,
      context
    );
    this.error = error;
    if (errorDescription !== undefined) this.errorDescription = errorDescription;
  }

  override toLogMeta(): LogMeta {
    return {
      ...super.toLogMeta(),
      error: this.error,
      errorDescription: this.errorDescription,
    };
  }
}

/**
 * Transport-level failure reaching an authorization server endpoint.
 */
export class NetworkError extends OAuthError {
  readonly kind = 'network' as const;

  constructor(message: string, context: OAuthErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Protocol-level error response from the authorization server.
 */
export class ServerError extends OAuthError {
  readonly kind = 'server' as const;
  readonly statusCode: number;
  /** OAuth error code, e.g. `invalid_grant` */
  readonly error: string;
  readonly errorDescription?: string;

  constructor(
    statusCode: number,
    error: string,
    errorDescription?: string,
    context: OAuthErrorContext = {}
  ) {
    super(
      errorDescription ? `${error}: ${errorDescription}` : error,
      context
    );
    this.statusCode = statusCode;
    this.error = error;
    if (errorDescription !== undefined) this.errorDescription = errorDescription;
  }

  override toLogMeta(): LogMeta {
    return {
      ...super.toLogMeta(),
      statusCode: this.statusCode,
      error: this.error,
      errorDescription: this.errorDescription,
    };
  }
}

/**
 * One endpoint's failure inside a multi-endpoint connect.
 */
export interface EndpointFailure {
  endpoint: string;
  error: Error;
}

/**
 * Composite failure of a multi-endpoint connect. Lists every failed endpoint,
 * not just the first.
 */
export class MultiServerConnectionError extends AggregateError {
  readonly failures: EndpointFailure[];

  constructor(failures: EndpointFailure[]) {
    super(
      failures.map((failure) => failure.error),
      `Failed to connect ${failures.length} endpoint(s): ${failures
        .map((failure) => `${failure.endpoint} (${failure.error.message})`)
        .join(', ')}`
    );
    this.name = 'MultiServerConnectionError';
    this.failures = failures;
  }
}

export function isOAuthError(value: unknown): value is OAuthError {
  return value instanceof OAuthError;
}
