/**
 * Timeout and cancellation helpers for collaborator calls.
 *
 * Stages never retry internally; a failed call surfaces to the caller,
 * which decides whether to re-invoke.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(context: string, timeoutMs: number) {
    super(`${context} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Create a timeout wrapper for any promise
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, context?: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(context || 'Operation', timeoutMs));
    }, timeoutMs);

    promise
      .then(result => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch(error => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException('The operation was aborted', 'AbortError');
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && error === signal.reason) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Reject as soon as `signal` aborts, without waiting for `promise`.
 * The underlying work is not cancelled unless it honours the signal itself.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise
      .then(result => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      })
      .catch(error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      });
  });
}
