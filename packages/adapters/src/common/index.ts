import { eventBase, MAX_TIMER_DELAY_MS, TimeoutError } from '@constify/shared';
import type { RewriteAdapter } from '../adapter';
import type { AdapterContext, RewriteOutcome, RewriteRequest } from '../types';
import { classifyRewriteError } from './classify';

export * from './classify';
export * from './response';

/**
 * Runs one attempt against a rewrite adapter with the request's timeout
 * enforced, and records `RewriteRequestStarted`/`RewriteRequestFinished`.
 *
 * Never throws: anything the adapter throws is classified into an outcome.
 * When the timeout elapses the adapter's signal is aborted and the attempt
 * resolves as a transient `TimeoutError`, even if the adapter ignores the signal.
 *
 * ```typescript
 * const outcome = await executeRewriteAttempt(adapter, request, ctx, 1);
 * if (outcome.kind === 'transient') scheduleRetry();
 * ```
 */
export async function executeRewriteAttempt(
  adapter: RewriteAdapter,
  request: RewriteRequest,
  ctx: AdapterContext,
  attempt: number,
): Promise<RewriteOutcome> {
  const provider = adapter.id();
  const startTime = Date.now();

  await ctx.logger.log({
    type: 'RewriteRequestStarted',
    ...eventBase(ctx.runId),
    payload: { provider, model: request.model, path: request.path, attempt },
  });

  const abortController = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<RewriteOutcome>((resolve) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(`Rewrite request timed out after ${request.timeoutMs}ms`);
      abortController.abort(error);
      resolve({ kind: 'transient', cause: error });
    }, Math.min(request.timeoutMs, MAX_TIMER_DELAY_MS));
  });

  const call = Promise.resolve()
    .then(() => adapter.rewrite(request, { ...ctx, abortSignal: abortController.signal }))
    .catch((error: unknown) => classifyRewriteError(error));

  let outcome: RewriteOutcome;
  try {
    outcome = await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }

  // An adapter that saw the abort reports it as an abort; the cause was the timeout.
  if (outcome.kind !== 'success' && abortController.signal.aborted) {
    const reason: unknown = abortController.signal.reason;
    if (reason instanceof TimeoutError) {
      outcome = { kind: 'transient', cause: reason };
    }
  }

  await ctx.logger.log({
    type: 'RewriteRequestFinished',
    ...eventBase(ctx.runId),
    payload: {
      provider,
      path: request.path,
      attempt,
      durationMs: Date.now() - startTime,
      outcome: outcome.kind,
      error: outcome.kind === 'success' ? undefined : outcome.cause.message,
    },
  });

  return outcome;
}
