import { describe, it, expect } from 'vitest';
import { ProviderError, RateLimitError } from '@constify/shared';
import { backoffDelay } from './retry';

describe('backoffDelay', () => {
  const options = { backoffMs: 1000, maxBackoffMs: 60_000 };

  it('doubles the base delay for every failed attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, options))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });

  it('caps the delay', () => {
    expect(backoffDelay(10, options)).toBe(60_000);
    expect(backoffDelay(3, { backoffMs: 1000, maxBackoffMs: 2500 })).toBe(2500);
  });

  it('waits at least as long as a rate limit asks, within the cap', () => {
    expect(backoffDelay(1, options, new RateLimitError('slow', { retryAfter: 5 }))).toBe(5000);
    expect(backoffDelay(1, options, new RateLimitError('slow', { retryAfter: 600 }))).toBe(60_000);
    expect(backoffDelay(4, options, new RateLimitError('slow', { retryAfter: 1 }))).toBe(8000);
  });

  it('ignores retry hints on other errors', () => {
    expect(backoffDelay(1, options, new ProviderError('down', { status: 503 }))).toBe(1000);
  });

  it('allows a zero backoff', () => {
    expect(backoffDelay(3, { backoffMs: 0, maxBackoffMs: 60_000 })).toBe(0);
  });
});
