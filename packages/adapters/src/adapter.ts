import { AdapterContext, RewriteOutcome, RewriteRequest } from './types';

/**
 * Interface for rewrite services.
 * Adapters give the pipeline a single, uniform call regardless of vendor.
 *
 * Implementations perform exactly one attempt per call and report failures
 * as outcomes rather than by throwing; retry policy belongs to the caller.
 *
 * @example
 * ```typescript
 * class EchoAdapter implements RewriteAdapter {
 *   id() { return 'echo'; }
 *   async rewrite(req) { return { kind: 'success', text: req.source }; }
 * }
 * ```
 */
export interface RewriteAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  /**
   * Ask the service to rewrite one source file.
   */
  rewrite(req: RewriteRequest, ctx: AdapterContext): Promise<RewriteOutcome>;
}
