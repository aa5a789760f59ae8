import { CancellationError } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import type { RequestOptions } from '../types.js';
import { abortReason, throwIfAborted } from '../utils/abort.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { parseCallbackParams, parseRedirectUrl } from './callback-params.js';
import type { CallbackOutcome } from './callback-route.js';
import type { AuthorizationHandler, CallbackResult } from './types.js';

export interface ExternalAuthorizationHandlerOptions {
  /** Receives the authorization URL, e.g. to redirect the host app's user */
  onAuthorizationUrl: (url: string) => void | Promise<void>;
  logger?: Logger;
}

/**
 * Variant for hosts that own the redirect endpoint themselves. The host gets
 * the URL through `onAuthorizationUrl` and later feeds the result in with
 * {@link deliver}, {@link deliverRedirect} or {@link fail}.
 *
 * One result is accepted per attempt; a result that arrives before
 * `collect()` is kept until it is asked for.
 */
export class ExternalAuthorizationHandler implements AuthorizationHandler {
  private readonly onAuthorizationUrl: (url: string) => void | Promise<void>;
  private readonly logger: Logger;

  private buffered?: CallbackOutcome;
  private waiter?: (outcome: CallbackOutcome) => void;
  private accepting = true;

  constructor(options: ExternalAuthorizationHandlerOptions) {
    this.onAuthorizationUrl = options.onAuthorizationUrl;
    this.logger =
      options.logger?.child({ component: 'ExternalAuthorizationHandler' }) ??
      createLogger({ component: 'ExternalAuthorizationHandler' });
  }

  /** Whether a `collect()` call is waiting for a result. */
  get isWaiting(): boolean {
    return this.waiter !== undefined;
  }

  async present(
    authorizationUrl: string,
    options: RequestOptions = {}
  ): Promise<void> {
    throwIfAborted(options.signal, 'present');
    this.buffered = undefined;
    this.accepting = true;
    await this.onAuthorizationUrl(authorizationUrl);
  }

  collect(options: RequestOptions = {}): Promise<CallbackResult> {
    const { signal } = options;
    throwIfAborted(signal, 'collect');

    return new Promise<CallbackResult>((resolve, reject) => {
      const settle = (outcome: CallbackOutcome): void => {
        signal?.removeEventListener('abort', onAbort);
        this.waiter = undefined;
        if (outcome.ok) resolve(outcome.result);
        else reject(outcome.error);
      };

      const onAbort = (): void => {
        settle({ ok: false, error: abortReason(signal, 'collect') });
      };

      const buffered = this.buffered;
      if (buffered) {
        this.buffered = undefined;
        settle(buffered);
        return;
      }

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = settle;
    });
  }

  async close(): Promise<void> {
    this.buffered = undefined;
  }

  /**
   * Feed the code and echoed state.
   * @returns false when a result was already accepted for this attempt
   */
  deliver(code: string, state?: string): boolean {
    return this.accept({
      ok: true,
      result: state === undefined ? { code } : { code, state },
    });
  }

  /**
   * Feed the full URL the user was redirected to.
   */
  deliverRedirect(url: string): boolean {
    let outcome: CallbackOutcome;
    try {
      outcome = {
        ok: true,
        result: parseCallbackParams(
          parseRedirectUrl(url, 'http://localhost').searchParams
        ),
      };
    } catch (error) {
      outcome = {
        ok: false,
        error: ErrorNormalizer.normalizeError(error, { stage: 'callback' }),
      };
    }
    return this.accept(outcome);
  }

  /**
   * Report that the user declined or the server returned an error.
   */
  fail(error: string, description?: string): boolean {
    return this.accept({
      ok: false,
      error: new CancellationError(error, description, { stage: 'callback' }),
    });
  }

  private accept(outcome: CallbackOutcome): boolean {
    if (!this.accepting) {
      this.logger.warn('Ignored authorization result for a finished attempt');
      return false;
    }
    this.accepting = false;

    if (this.waiter) {
      this.waiter(outcome);
    } else {
      this.buffered = outcome;
    }
    return true;
  }
}
