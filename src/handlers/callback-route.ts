import type { IncomingMessage, RequestListener, ServerResponse } from 'node:http';
import { finished } from 'node:stream';
import createError, { type HttpError } from 'http-errors';
import { StatusCodes } from 'http-status-codes';
import type { OAuthError } from '../errors.js';
import { redactQueryParams } from '../logging/redaction.js';
import type { Logger } from '../logging/types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { parseCallbackParams } from './callback-params.js';
import { failurePage, successPage } from './callback-pages.js';
import type { CallbackResult } from './types.js';

export type CallbackOutcome =
  | { ok: true; result: CallbackResult }
  | { ok: false; error: OAuthError };

export interface CallbackRouteOptions {
  /** Redirect path, e.g. `/callback` */
  path: string;
  /** Receives the first callback once its response has been flushed */
  onOutcome: (outcome: CallbackOutcome) => void;
  logger?: Logger;
}

/**
 * Request listener for an authorization redirect. Accepts exactly one GET on
 * `path`; later requests get 410 Gone.
 */
export function createCallbackRoute(
  options: CallbackRouteOptions
): RequestListener {
  const { path, onOutcome, logger } = options;
  let consumed = false;

  return (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    logger?.debug('Callback listener request', {
      method: req.method,
      url: redactQueryParams(req.url ?? '/', ['code', 'state']),
    });

    if (url.pathname !== path) {
      sendError(res, createError(StatusCodes.NOT_FOUND));
      return;
    }
    if (req.method !== 'GET') {
      sendError(
        res,
        createError(StatusCodes.METHOD_NOT_ALLOWED, { headers: { Allow: 'GET' } })
      );
      return;
    }
    if (consumed) {
      logger?.warn('Rejected repeated authorization callback', { path });
      sendError(
        res,
        createError(StatusCodes.GONE, 'Authorization callback already received')
      );
      return;
    }
    consumed = true;

    let outcome: CallbackOutcome;
    try {
      outcome = { ok: true, result: parseCallbackParams(url.searchParams) };
    } catch (error) {
      outcome = {
        ok: false,
        error: ErrorNormalizer.normalizeError(error, { stage: 'callback' }),
      };
    }

    logger?.info('Authorization callback received', {
      path,
      success: outcome.ok,
      hasState: outcome.ok && outcome.result.state !== undefined,
    });

    res.writeHead(outcome.ok ? StatusCodes.OK : StatusCodes.BAD_REQUEST, {
      'Content-Type': 'text/html; charset=utf-8',
      'Cache-Control': 'no-store',
    });
    res.end(outcome.ok ? successPage() : failurePage(outcome.error.message));
    finished(res, () => onOutcome(outcome));
  };
}

function sendError(res: ServerResponse, error: HttpError): void {
  res.writeHead(error.status, {
    'Content-Type': 'text/plain; charset=utf-8',
    ...error.headers,
  });
  res.end(error.message);
}
