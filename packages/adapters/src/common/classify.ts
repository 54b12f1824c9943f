import { ProviderError, RateLimitError, TimeoutError } from '@constify/shared';
import type { FatalFailure, TransientFailure } from '../types';

const TRANSIENT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
]);

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return readCode(error.cause);
  return undefined;
}

/**
 * Determines if an error is worth another attempt.
 *
 * Transient: `RateLimitError`, `TimeoutError`, HTTP 429 and 5xx, and socket
 * level failures such as `ECONNRESET`. Everything else, including other HTTP
 * 4xx responses, is fatal.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof ProviderError && error.retryable !== undefined) {
    return error.retryable;
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = readCode(error);
  return code !== undefined && TRANSIENT_ERROR_CODES.has(code);
}

/**
 * Turns anything thrown during an attempt into a failure outcome.
 */
export function classifyRewriteError(error: unknown): TransientFailure | FatalFailure {
  const cause = error instanceof Error ? error : new Error(String(error));
  return isTransientError(error) ? { kind: 'transient', cause } : { kind: 'fatal', cause };
}
