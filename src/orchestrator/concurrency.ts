// ---------------------------------------------------------------------------
// Concurrency control for source calls, wrapping p-limit.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";

/**
 * Caps the number of in-flight source calls across every search pass
 * sharing the pool. A call whose signal aborts while it waits for a slot
 * is never started.
 */
export class ConcurrencyPool {
  private readonly limiter: ReturnType<typeof pLimit>;

  constructor(readonly maxConcurrency = 8) {
    this.limiter = pLimit(maxConcurrency);
  }

  run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.limiter(async (): Promise<T> => {
      if (signal?.aborted) throw signal.reason;
      return fn();
    });
  }

  get activeCount(): number {
    return this.limiter.activeCount;
  }

  get pendingCount(): number {
    return this.limiter.pendingCount;
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts, whichever comes first. Sources that ignore the signal are cut off
 * all the same.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
