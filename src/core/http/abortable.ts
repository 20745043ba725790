/**
 * Abort helpers for HTTP clients.
 *
 * A fetch timeout must also cover reading the body: the signal passed to
 * fetch only guards the body when the runtime ties the two together, which
 * injected fetch implementations do not have to do.
 */

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * An AbortController that aborts itself after `timeoutMs`.
 * Call `clear()` once the response has been fully consumed.
 */
export interface RequestTimeout {
  signal: AbortSignal;
  readonly timedOut: boolean;
  clear(): void;
}

export function startTimeout(timeoutMs: number): RequestTimeout {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  return {
    signal: controller.signal,
    get timedOut() {
      return controller.signal.aborted;
    },
    clear() {
      clearTimeout(timer);
    },
  };
}
