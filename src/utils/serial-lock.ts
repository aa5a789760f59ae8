/**
 * FIFO mutual exclusion for async work. Tasks passed to {@link run} execute
 * one at a time in call order; a failing task does not block later ones.
 *
 * Not reentrant: calling `run` from inside a running task on the same lock
 * waits for that task and therefore never completes.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  private release(): void {
    this.pending--;
  }
}
