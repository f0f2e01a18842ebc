import { getConfig } from "../config.js";

export type RetryOptions<T> = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Decide from a resolved value whether to try again. */
  retryIf?: (value: T) => boolean;
  signal?: AbortSignal;
  onRetry?: (attempt: number, value: T) => void;
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Call `fn` until `retryIf` says the value is acceptable or attempts run
 * out, backing off exponentially between attempts. Each attempt re-issues
 * the call. Thrown errors are not retried.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions<T> = {}): Promise<T> {
  const cfg = getConfig().retry;
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 1);
  const baseDelayMs = opts.baseDelayMs ?? cfg.baseDelayMs;
  const maxDelayMs = opts.maxDelayMs ?? cfg.maxDelayMs;

  let value = await fn(1);
  for (let attempt = 2; attempt <= maxAttempts; attempt++) {
    if (!opts.retryIf?.(value) || opts.signal?.aborted) break;
    opts.onRetry?.(attempt, value);
    await sleep(Math.min(baseDelayMs * 2 ** (attempt - 2), maxDelayMs), opts.signal);
    if (opts.signal?.aborted) break;
    value = await fn(attempt);
  }
  return value;
}
