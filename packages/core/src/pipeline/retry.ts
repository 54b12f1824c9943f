import { MAX_TIMER_DELAY_MS, RateLimitError } from '@constify/shared';

export interface BackoffOptions {
  backoffMs: number;
  maxBackoffMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY_MS)));

/**
 * Delay to wait after failed attempt `attempt` (1-based) before the next one:
 * `backoffMs * 2^(attempt-1)`, capped at `maxBackoffMs`.
 *
 * A rate limit that names its own `retry-after` is honoured when it asks for
 * longer, still within the cap.
 */
export function backoffDelay(attempt: number, options: BackoffOptions, cause?: Error): number {
  let delay = options.backoffMs * Math.pow(2, attempt - 1);
  if (cause instanceof RateLimitError && cause.retryAfter !== undefined) {
    delay = Math.max(delay, cause.retryAfter * 1000);
  }
  return Math.min(delay, options.maxBackoffMs);
}
