import type { Logger } from '@constify/shared';

/**
 * One file's worth of work for the rewrite service.
 */
export interface RewriteRequest {
  /** Absolute path of the file being rewritten; used for logging only */
  path: string;
  /** Full source text as read from disk */
  source: string;
  /** Model identifier passed through to the service */
  model: string;
  /** Upper bound for this single attempt */
  timeoutMs: number;
}

/** The service returned usable rewritten source. */
export interface RewriteSuccess {
  kind: 'success';
  text: string;
}

/** A failure that another attempt may fix: network, timeout, HTTP 429 or 5xx. */
export interface TransientFailure {
  kind: 'transient';
  cause: Error;
}

/** A failure that retrying will not fix: other HTTP 4xx, malformed or empty responses. */
export interface FatalFailure {
  kind: 'fatal';
  cause: Error;
}

export type RewriteOutcome = RewriteSuccess | TransientFailure | FatalFailure;

/**
 * Context passed to adapter methods for each attempt.
 */
export interface AdapterContext {
  /** Unique identifier for the current run */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Aborted when the attempt's timeout elapses */
  abortSignal?: AbortSignal;
}
