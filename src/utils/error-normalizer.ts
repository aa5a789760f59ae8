import { ReasonPhrases, StatusCodes } from 'http-status-codes';
import {
  NetworkError,
  OAuthError,
  ServerError,
  TimeoutError,
  type OAuthErrorContext,
} from '../errors.js';

/**
 * Context for normalization: where the failure happened and, for deadline
 * failures, which timeout was configured.
 */
export interface NormalizationContext extends Omit<OAuthErrorContext, 'cause'> {
  timeoutMs?: number;
}

/** Transport error codes that mean "could not reach the server". */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Utility class mapping heterogeneous failures (fetch rejections, OAuth error
 * bodies, response-like objects, strings) onto the library's error taxonomy.
 */
export class ErrorNormalizer {
  /**
   * Normalize an unknown throw into an {@link OAuthError}. Values that are
   * already OAuthErrors pass through unchanged.
   */
  static normalizeError(
    e: unknown,
    context: NormalizationContext = {}
  ): OAuthError {
    if (e instanceof OAuthError) {
      return e;
    }

    const errorContext = this.toErrorContext(context, e);

    return (
      this.tryOAuthErrorShape(e, errorContext) ??
      this.tryResponseShape(e, errorContext) ??
      this.tryAbortShape(e, context, errorContext) ??
      this.tryNetworkShape(e, errorContext) ??
      this.tryNativeErrorShape(e, context, errorContext) ??
      this.createFallbackError(e, errorContext)
    );
  }

  /**
   * Map an HTTP status to the OAuth error code used when a response carries
   * no `error` field of its own.
   */
  static mapStatusToOAuthError(statusCode: number): string {
    switch (statusCode) {
      case StatusCodes.BAD_REQUEST:
      case StatusCodes.NOT_FOUND:
        return 'invalid_request';
      case StatusCodes.UNAUTHORIZED:
        return 'invalid_client';
      case StatusCodes.FORBIDDEN:
        return 'access_denied';
      case StatusCodes.TOO_MANY_REQUESTS:
      case StatusCodes.SERVICE_UNAVAILABLE:
        return 'temporarily_unavailable';
      default:
        return statusCode >= 500
          ? 'server_error'
          : statusCode >= 400
            ? 'invalid_request'
            : 'server_error';
    }
  }

  /**
   * Build a ServerError from a parsed error body and the HTTP status it came
   * with. Used at token and registration endpoints.
   */
  static fromResponseBody(
    statusCode: number,
    body: unknown,
    context: OAuthErrorContext = {}
  ): ServerError {
    const obj = this.asObject(body);
    const error =
      this.readString(obj, 'error') ?? this.mapStatusToOAuthError(statusCode);
    const description =
      this.readString(obj, 'error_description') ?? this.getReasonPhrase(statusCode);
    return new ServerError(statusCode, error, description, context);
  }

  /**
   * `{ error, statusCode | status }` objects, e.g. OAuth error bodies that
   * were thrown as-is.
   */
  private static tryOAuthErrorShape(
    e: unknown,
    context: OAuthErrorContext
  ): OAuthError | null {
    const obj = this.asObject(e);
    const error = this.readString(obj, 'error');
    const statusCode =
      this.readNumber(obj, 'statusCode') ?? this.readNumber(obj, 'status');

    if (!error || statusCode === undefined) return null;

    const description =
      this.readString(obj, 'error_description') ?? this.readString(obj, 'message');
    return new ServerError(statusCode, error, description, context);
  }

  /**
   * Fetch Response-like objects (`{ status, statusText }`).
   */
  private static tryResponseShape(
    e: unknown,
    context: OAuthErrorContext
  ): OAuthError | null {
    if (e instanceof Error) return null;
    const obj = this.asObject(e);
    const statusCode = this.readNumber(obj, 'status');
    if (statusCode === undefined) return null;

    const description =
      this.readString(obj, 'statusText') || this.getReasonPhrase(statusCode);
    return new ServerError(
      statusCode,
      this.mapStatusToOAuthError(statusCode),
      description,
      context
    );
  }

  /**
   * AbortSignal timeouts (`TimeoutError`) and aborted requests (`AbortError`).
   */
  private static tryAbortShape(
    e: unknown,
    normalization: NormalizationContext,
    context: OAuthErrorContext
  ): OAuthError | null {
    if (!(e instanceof Error)) return null;
    if (e.name !== 'TimeoutError' && e.name !== 'AbortError') return null;

    const timeoutMs = normalization.timeoutMs ?? 0;
    return new TimeoutError(
      `Request ${e.name === 'AbortError' ? 'aborted' : 'timed out'}${
        timeoutMs ? ` after ${timeoutMs}ms` : ''
      }`,
      timeoutMs,
      context
    );
  }

  /**
   * `fetch failed` TypeErrors and socket errors carrying a transport code,
   * directly or on their `cause`.
   */
  private static tryNetworkShape(
    e: unknown,
    context: OAuthErrorContext
  ): OAuthError | null {
    if (!(e instanceof Error)) return null;

    const code = this.readString(this.asObject(e), 'code');
    const causeCode = this.readString(this.asObject(e.cause), 'code');
    const isFetchFailure = e instanceof TypeError && /fetch failed/i.test(e.message);

    if (
      isFetchFailure ||
      (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
      (causeCode !== undefined && NETWORK_ERROR_CODES.has(causeCode))
    ) {
      const detail = causeCode ?? code;
      return new NetworkError(
        detail ? `${e.message} (${detail})` : e.message,
        context
      );
    }
    return null;
  }

  /**
   * Remaining native errors, classified by message.
   */
  private static tryNativeErrorShape(
    e: unknown,
    normalization: NormalizationContext,
    context: OAuthErrorContext
  ): OAuthError | null {
    if (!(e instanceof Error)) return null;

    if (/timeout|timed out/i.test(e.message)) {
      return new TimeoutError(e.message, normalization.timeoutMs ?? 0, context);
    }
    if (/network|ECONNREFUSED|socket hang up/i.test(e.message)) {
      return new NetworkError(e.message, context);
    }
    return new ServerError(
      StatusCodes.INTERNAL_SERVER_ERROR,
      'server_error',
      e.message,
      context
    );
  }

  private static createFallbackError(
    e: unknown,
    context: OAuthErrorContext
  ): OAuthError {
    return new ServerError(
      StatusCodes.INTERNAL_SERVER_ERROR,
      'server_error',
      typeof e === 'string' ? e : ReasonPhrases.INTERNAL_SERVER_ERROR,
      context
    );
  }

  private static toErrorContext(
    context: NormalizationContext,
    cause: unknown
  ): OAuthErrorContext {
    const result: OAuthErrorContext = { cause };
    if (context.stage !== undefined) result.stage = context.stage;
    if (context.endpoint !== undefined) result.endpoint = context.endpoint;
    if (context.issuer !== undefined) result.issuer = context.issuer;
    return result;
  }

  private static getReasonPhrase(statusCode: number): string {
    const reasonPhrases: Record<number, string> = {
      [StatusCodes.BAD_REQUEST]: ReasonPhrases.BAD_REQUEST,
      [StatusCodes.UNAUTHORIZED]: ReasonPhrases.UNAUTHORIZED,
      [StatusCodes.FORBIDDEN]: ReasonPhrases.FORBIDDEN,
      [StatusCodes.NOT_FOUND]: ReasonPhrases.NOT_FOUND,
      [StatusCodes.TOO_MANY_REQUESTS]: ReasonPhrases.TOO_MANY_REQUESTS,
      [StatusCodes.INTERNAL_SERVER_ERROR]: ReasonPhrases.INTERNAL_SERVER_ERROR,
      [StatusCodes.BAD_GATEWAY]: ReasonPhrases.BAD_GATEWAY,
      [StatusCodes.SERVICE_UNAVAILABLE]: ReasonPhrases.SERVICE_UNAVAILABLE,
      [StatusCodes.GATEWAY_TIMEOUT]: ReasonPhrases.GATEWAY_TIMEOUT,
    };

    return reasonPhrases[statusCode] ?? `HTTP ${statusCode}`;
  }

  private static asObject(v: unknown): Record<string, unknown> | null {
    return v !== null && typeof v === 'object'
      ? (v as Record<string, unknown>)
      : null;
  }

  private static readNumber(
    obj: Record<string, unknown> | null,
    key: string
  ): number | undefined {
    const value = obj?.[key];
    return typeof value === 'number' ? value : undefined;
  }

  private static readString(
    obj: Record<string, unknown> | null,
    key: string
  ): string | undefined {
    const value = obj?.[key];
    return typeof value === 'string' ? value : undefined;
  }
}
