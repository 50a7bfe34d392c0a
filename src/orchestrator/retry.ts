// ---------------------------------------------------------------------------
// Retry logic with exponential backoff and jitter.
// ---------------------------------------------------------------------------

import { SourceUnavailableError } from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /** Defaults to {@link isTransientSourceError}. */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting stops further attempts and interrupts the backoff sleep. */
  signal?: AbortSignal;
}

// ── Default retry predicate ────────────────────────────────────────────────

/**
 * Only network failures and 5xx responses are worth another attempt.
 * Timeouts already consumed the call's budget; 4xx and parse failures will
 * not change on retry.
 */
export function isTransientSourceError(error: unknown): boolean {
  if (!(error instanceof SourceUnavailableError)) return false;
  return error.status === null || error.status >= 500;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/** Full jitter: a random delay between 0 and the exponential ceiling. */
function computeDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.round(Math.random() * exponential);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics. On failure `shouldRetry` is consulted;
 * retryable failures sleep with exponential backoff before the next attempt.
 * When attempts run out the last error is thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    shouldRetry = isTransientSourceError,
    signal,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries || !shouldRetry(error) || signal?.aborted) {
        throw error;
      }
      await sleep(computeDelay(attempt, baseDelayMs), signal);
    }
  }
}
