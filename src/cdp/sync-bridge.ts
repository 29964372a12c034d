/**
 * Helpers that let one caller wait on a close driven by somebody else.
 *
 * Close work is always started on a fresh macrotask via
 * {@link scheduleDetached}, so neither the caller's stack nor the
 * connection's receive loop ever runs it inline. Waiters only observe the
 * completion signal through {@link waitWithin}; they never drive it.
 */

/**
 * Starts `work` on its own turn of the event loop and returns its result.
 */
export function scheduleDetached<T>(work: () => Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    setImmediate(() => {
      work().then(resolve, reject);
    });
  });
}

/**
 * Waits at most `timeoutMs` for `promise`. Resolves `true` when it fulfils,
 * `false` when the deadline passes first, and rethrows its rejection. The
 * deadline timer never keeps the process alive.
 */
export function waitWithin(
  promise: Promise<unknown>,
  timeoutMs: number
): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    timer.unref();
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Shares an in-flight close between concurrent callers. The memo is dropped
 * once the run settles, so a failed close can be retried.
 */
export class SharedClose {
  private inflight: Promise<void> | null = null;

  run(work: () => Promise<void>): Promise<void> {
    if (!this.inflight) {
      this.inflight = scheduleDetached(work).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }
}
