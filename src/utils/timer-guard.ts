/**
 * Deadline Guards
 *
 * Wraps the single timer behind a walk deadline so it is always cleared,
 * and lets pending filesystem work be abandoned when the deadline fires.
 *
 * Usage:
 * ```typescript
 * const deadline = new DeadlineGuard('cache-walk');
 * deadline.arm(timeoutMs);
 * try {
 *   await withAbort(walk(deadline.signal), deadline.signal);
 * } finally {
 *   deadline.clear();
 * }
 * ```
 */

/**
 * Timer lifecycle guard that aborts an AbortController on expiry.
 */
export class DeadlineGuard {
  private timer?: NodeJS.Timeout;
  private readonly controller = new AbortController();
  private readonly name: string;

  constructor(name = 'anonymous') {
    this.name = name;
  }

  /**
   * Arm the deadline (clears any existing timer first).
   *
   * A missing or non-positive timeout leaves the guard unarmed.
   */
  arm(timeoutMs: number | undefined): void {
    this.clear();
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.controller.abort(createAbortError(`${this.name} exceeded ${timeoutMs}ms`));
    }, timeoutMs);
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  isArmed(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }
}

/**
 * Error named `AbortError`, matching what Node raises for aborted calls.
 */
export function createAbortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 *
 * The underlying work is not cancelled; its result is ignored.
 */
export function withAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // The abandoned promise may still reject later
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
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

/**
 * Throw the abort reason when the signal has fired.
 */
export function checkAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : createAbortError('Operation aborted');
}
