/**
 * Resilience Manager - bounded retry with exponential backoff.
 *
 * The library does not retry network faults internally; this is used only
 * where a policy asks for it (refresh-token exchanges that hit a retryable
 * server error such as rate limiting).
 */

import { sleep } from './deadline.js';

/**
 * Retry execution options
 */
export interface RetryContext {
  /** Maximum retry attempts after the first (default: 2) */
  maxRetries?: number;
  /** Base backoff delay in milliseconds, doubled per attempt (default: 300) */
  backoffMs?: number;
  /** Decides whether a failure is worth another attempt (default: never) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Observer called before each backoff wait */
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
  /** Cancels pending backoff waits */
  signal?: AbortSignal;
}

export class ResilienceManager {
  public static readonly DEFAULT_MAX_RETRIES = 2;
  public static readonly DEFAULT_BACKOFF_MS = 300;

  /**
   * Execute an operation, retrying failures accepted by `shouldRetry`.
   *
   * @param operation - Async operation to execute; receives the 0-based attempt
   * @param context - Retry configuration
   * @returns The first successful result
   * @throws The last failure
   */
  public static async executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    context: RetryContext = {}
  ): Promise<T> {
    const {
      maxRetries = ResilienceManager.DEFAULT_MAX_RETRIES,
      backoffMs = ResilienceManager.DEFAULT_BACKOFF_MS,
      shouldRetry = () => false,
      onRetry,
      signal,
    } = context;

    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;

        if (attempt < maxRetries && shouldRetry(error, attempt)) {
          const wait = ResilienceManager.backoffFor(attempt, backoffMs);
          onRetry?.(error, attempt, wait);
          await sleep(wait, signal);
          continue;
        }
        break;
      }
    }

    throw lastError;
  }

  /**
   * Backoff before retry number `attempt + 1`.
   */
  public static backoffFor(attempt: number, backoffMs: number): number {
    return backoffMs * Math.pow(2, attempt);
  }
}
