import { CancellationError, OAuthError } from '../errors.js';

/**
 * The error an aborted operation rejects with: the signal's reason when it is
 * already a library error, otherwise a CancellationError wrapping it.
 */
export function abortReason(signal: AbortSignal | undefined, stage: string): OAuthError {
  const reason: unknown = signal?.reason;
  return reason instanceof OAuthError
    ? reason
    : new CancellationError('aborted', 'Authorization was aborted', {
        stage,
        cause: reason,
      });
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw abortReason(signal, stage);
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts. `promise` keeps running; its later rejection is observed here.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  stage: string
): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal, stage));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
