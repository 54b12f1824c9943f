import type { CommitReceipt } from '../commit/writer';

/**
 * Why a file ended up `failed`:
 * - `io`: the source could not be read
 * - `transient`: every attempt failed with a retryable error
 * - `fatal`: the rewrite service rejected the request or answered with garbage
 * - `validation`: the rewritten text was rejected by the validation policy
 * - `commit`: the rewritten text could not be written
 * - `cancelled`: the run was interrupted before the file was dispatched
 * - `internal`: an unexpected error escaped the file's pipeline
 */
export type FailureKind =
  | 'io'
  | 'transient'
  | 'fatal'
  | 'validation'
  | 'commit'
  | 'cancelled'
  | 'internal';

interface TaskResultBase {
  path: string;
  /** Rewrite attempts made for this file */
  attempts: number;
}

export interface SkippedResult extends TaskResultBase {
  outcome: 'skipped';
  reason: string;
}

export interface WrittenResult extends TaskResultBase {
  outcome: 'written';
  receipt: CommitReceipt;
  warnings: string[];
}

export interface FailedResult extends TaskResultBase {
  outcome: 'failed';
  kind: FailureKind;
  reason: string;
}

export type TaskResult = SkippedResult | WrittenResult | FailedResult;

export interface ResultCounts {
  skipped: number;
  written: number;
  failed: number;
}

/**
 * Append-only record of one result per input path.
 * A second result for the same path, or a result for a path that was never
 * submitted, is a programming error and throws.
 */
export class ResultCollector {
  private readonly byPath = new Map<string, TaskResult>();
  private readonly expected: Set<string>;

  constructor(private readonly order: readonly string[]) {
    this.expected = new Set(order);
  }

  add(result: TaskResult): void {
    if (!this.expected.has(result.path)) {
      throw new Error(`Result for unknown path: ${result.path}`);
    }
    if (this.byPath.has(result.path)) {
      throw new Error(`Duplicate result for ${result.path}`);
    }
    this.byPath.set(result.path, result);
  }

  /** Paths that have no result yet, in input order */
  missing(): string[] {
    return this.order.filter((p) => !this.byPath.has(p));
  }

  /** Recorded results in input order */
  results(): TaskResult[] {
    const out: TaskResult[] = [];
    for (const path of this.order) {
      const result = this.byPath.get(path);
      if (result) out.push(result);
    }
    return out;
  }

  counts(): ResultCounts {
    return countResults(this.results());
  }
}

export function countResults(results: readonly TaskResult[]): ResultCounts {
  const counts: ResultCounts = { skipped: 0, written: 0, failed: 0 };
  for (const result of results) {
    counts[result.outcome]++;
  }
  return counts;
}

/** 0 when no file failed, 1 otherwise. */
export function exitCodeFor(results: readonly TaskResult[]): number {
  return results.some((r) => r.outcome === 'failed') ? 1 : 0;
}
