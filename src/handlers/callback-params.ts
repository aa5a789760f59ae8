import { CallbackError, CancellationError } from '../errors.js';
import type { CallbackResult } from './types.js';

/**
 * Read an authorization response from callback query parameters.
 *
 * @throws CancellationError when the server reported an `error`
 * @throws CallbackError when there is no `code`
 */
export function parseCallbackParams(params: URLSearchParams): CallbackResult {
  const error = params.get('error');
  if (error) {
    throw new CancellationError(
      error,
      params.get('error_description') ?? undefined,
      { stage: 'callback' }
    );
  }

  const code = params.get('code');
  if (!code) {
    throw new CallbackError(
      'missing_code',
      'Authorization callback did not include a code',
      { stage: 'callback' }
    );
  }

  const state = params.get('state');
  return state ? { code, state } : { code };
}

/**
 * Parse the URL the user was redirected to.
 *
 * @throws CallbackError when it is not a URL
 */
export function parseRedirectUrl(url: string, base?: string): URL {
  try {
    return new URL(url, base);
  } catch (error) {
    throw new CallbackError(
      'invalid_redirect',
      'Authorization redirect is not a valid URL',
      { stage: 'callback', cause: error }
    );
  }
}

/**
 * Read an authorization response from pasted input: a full redirect URL, a
 * bare query string, or the code itself.
 */
export function parseCallbackInput(input: string): CallbackResult {
  const trimmed = input.trim();
  if (trimmed === '') {
    throw new CallbackError('missing_code', 'No authorization code was entered', {
      stage: 'callback',
    });
  }

  if (/^https?:\/\//i.test(trimmed)) {
    return parseCallbackParams(parseRedirectUrl(trimmed).searchParams);
  }
  if (trimmed.includes('=')) {
    return parseCallbackParams(new URLSearchParams(trimmed.replace(/^\?/, '')));
  }
  return { code: trimmed };
}
