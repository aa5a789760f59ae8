import { CancellationError, TimeoutError } from '../errors.js';

export interface DeadlineOptions {
  /** Milliseconds before the operation is abandoned */
  timeoutMs: number;
  /** Caller cancellation; aborting it cancels the operation */
  signal?: AbortSignal;
  /** Flow stage recorded on the raised error */
  stage: string;
  /** Endpoint recorded on the raised error */
  endpoint?: string;
}

/**
 * Run `operation` under a deadline.
 *
 * The operation receives an AbortSignal that fires when the deadline passes
 * or the caller's signal aborts; its abort reason is the TimeoutError or
 * CancellationError this function rejects with. The returned promise settles
 * exactly once. A late settlement of the operation after the deadline is
 * ignored.
 */
export function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const { timeoutMs, signal: parent, stage, endpoint } = options;
  const controller = new AbortController();
  const context = endpoint === undefined ? { stage } : { stage, endpoint };

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const onParentAbort = (): void => {
      const reason = parent?.reason;
      abortWith(
        reason instanceof CancellationError || reason instanceof TimeoutError
          ? reason
          : new CancellationError('aborted', `${stage} was aborted by the caller`, context)
      );
    };

    const timer = setTimeout(() => {
      abortWith(
        new TimeoutError(`${stage} timed out after ${timeoutMs}ms`, timeoutMs, context)
      );
    }, timeoutMs);

    const cleanup = (): void => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      cleanup();
      finish();
    };

    function abortWith(error: CancellationError | TimeoutError): void {
      if (settled) return;
      controller.abort(error);
      settle(() => reject(error));
    }

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }

    pending.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    );
  });
}

/**
 * Promise that resolves after `ms`, or rejects with the signal's reason when
 * the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
