import { ProviderError, RateLimitError } from '@constify/shared';
import type { RewriteAdapter } from '../adapter';
import type { AdapterContext, RewriteOutcome, RewriteRequest } from '../types';

export const FAKE_BEHAVIOR_ENV = 'CONSTIFY_FAKE_BEHAVIOR';

export const FAKE_REWRITE_HEADER = '// constify: rewritten by the fake provider\n';

export type FakeStep =
  | RewriteOutcome
  | ((request: RewriteRequest) => RewriteOutcome | Promise<RewriteOutcome>);

function defaultRewrite(request: RewriteRequest): RewriteOutcome {
  return { kind: 'success', text: FAKE_REWRITE_HEADER + request.source };
}

/**
 * In-process rewrite adapter with scripted outcomes.
 *
 * Steps are consumed one per call. Once the script is exhausted the adapter
 * falls back to `CONSTIFY_FAKE_BEHAVIOR` (a comma list of `TRANSIENT`, `FATAL`
 * and `SUCCESS`, also consumed one per call) and finally to prefixing the
 * source with {@link FAKE_REWRITE_HEADER}.
 */
export class FakeRewriteAdapter implements RewriteAdapter {
  readonly calls: RewriteRequest[] = [];
  private readonly script: FakeStep[];

  constructor(
    script: FakeStep[] = [],
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.script = [...script];
  }

  id(): string {
    return 'fake';
  }

  async rewrite(request: RewriteRequest, _ctx: AdapterContext): Promise<RewriteOutcome> {
    this.calls.push(request);

    const step = this.script.shift();
    if (step !== undefined) {
      return typeof step === 'function' ? step(request) : step;
    }

    const behaviors = (this.env[FAKE_BEHAVIOR_ENV] ?? '').split(',').filter(Boolean);
    const current = behaviors.shift();
    this.env[FAKE_BEHAVIOR_ENV] = behaviors.join(',');

    switch (current?.trim().toUpperCase()) {
      case 'TRANSIENT':
        return { kind: 'transient', cause: new RateLimitError('Fake rate limit') };
      case 'FATAL':
        return {
          kind: 'fatal',
          cause: new ProviderError('Fake bad request', { status: 400, retryable: false }),
        };
      default:
        return defaultRewrite(request);
    }
  }
}
