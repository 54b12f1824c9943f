import nodeFs from 'node:fs/promises';
import {
  errorMessage,
  eventBase,
  Fs,
  Logger,
  RunConfig,
  ScanError,
  ValidationConfig,
  ValidationError,
} from '@constify/shared';
import { hasLiteralOutsideComment } from '@constify/repo';
import {
  AdapterContext,
  executeRewriteAttempt,
  RewriteAdapter,
  RewriteOutcome,
  RewriteRequest,
} from '@constify/adapters';
import { CommitReceipt, CommitWriter } from '../commit/writer';
import { FileTask } from './task';
import { FailedResult, FailureKind, ResultCollector, TaskResult } from './results';
import { backoffDelay, sleep as defaultSleep, Sleep } from './retry';
import { checkRewrite } from './validation';

export interface PipelineSettings {
  model: string;
  run: RunConfig;
  validation: ValidationConfig;
}

export interface PipelineDeps {
  adapter: RewriteAdapter;
  logger: Logger;
  writer?: CommitWriter;
  /** Used for reading sources */
  fs?: Fs;
  sleep?: Sleep;
}

export interface RunOptions {
  runId?: string;
  /** Stops dispatching new files once aborted; files already in flight finish */
  signal?: AbortSignal;
  /** Called once per file as soon as its result is recorded, cancelled files included */
  onResult?: (result: TaskResult) => void | Promise<void>;
}

export interface RunSummary {
  runId: string;
  results: TaskResult[];
  counts: { skipped: number; written: number; failed: number };
  durationMs: number;
}

const CANCELLED_REASON = 'cancelled';

/**
 * Runs every file through read → gate → rewrite (with retries) → validate →
 * commit on a fixed pool of workers, and records exactly one result per file.
 * Errors never escape a file: `run` always resolves.
 */
export class RefactorPipeline {
  private readonly adapter: RewriteAdapter;
  private readonly logger: Logger;
  private readonly writer: CommitWriter;
  private readonly fs: Fs;
  private readonly sleep: Sleep;

  constructor(
    private readonly settings: PipelineSettings,
    deps: PipelineDeps,
  ) {
    this.adapter = deps.adapter;
    this.logger = deps.logger;
    this.writer = deps.writer ?? new CommitWriter();
    this.fs = deps.fs ?? nodeFs;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(paths: readonly string[], options: RunOptions = {}): Promise<RunSummary> {
    const runId = options.runId ?? Date.now().toString();
    const startTime = Date.now();
    const order = [...new Set(paths)];
    const collector = new ResultCollector(order);
    const { run } = this.settings;

    await this.logger.log({
      type: 'RunStarted',
      ...eventBase(runId),
      payload: {
        fileCount: order.length,
        workers: run.workers,
        policy: run.policy,
        model: this.settings.model,
      },
    });

    const tasks = order.map((path) => new FileTask(path, runId, this.logger));
    const poolSize = Math.max(1, Math.min(run.workers, tasks.length));
    let next = 0;

    const record = async (result: TaskResult): Promise<void> => {
      collector.add(result);
      if (!options.onResult) return;
      try {
        await options.onResult(result);
      } catch (error) {
        await this.logger.error(
          error instanceof Error ? error : new Error(String(error)),
          `Result listener failed for ${result.path}`,
        );
      }
    };

    const worker = async (): Promise<void> => {
      while (!options.signal?.aborted) {
        const index = next++;
        if (index >= tasks.length) return;
        const task = tasks[index];
        await record(await this.settle(task, runId));
      }
    };

    await Promise.all(Array.from({ length: poolSize }, () => worker()));

    const undispatched = new Set(collector.missing());
    for (const task of tasks.filter((t) => undispatched.has(t.path))) {
      await task.transition('failed', { reason: CANCELLED_REASON });
      await record(failed(task, 'cancelled', CANCELLED_REASON));
    }

    const results = collector.results();
    const counts = collector.counts();
    const durationMs = Date.now() - startTime;

    await this.logger.log({
      type: 'RunFinished',
      ...eventBase(runId),
      payload: { ...counts, durationMs },
    });

    return { runId, results, counts, durationMs };
  }

  /**
   * Processes one file and turns anything unexpected into a failed result.
   */
  private async settle(task: FileTask, runId: string): Promise<TaskResult> {
    try {
      return await this.processFile(task, runId);
    } catch (error) {
      await this.logger.error(
        error instanceof Error ? error : new Error(String(error)),
        `Unexpected error while processing ${task.path}`,
      );
      return failed(task, 'internal', errorMessage(error));
    }
  }

  private async processFile(task: FileTask, runId: string): Promise<TaskResult> {
    const { run } = this.settings;
    const fileLogger = this.logger.child({ file: task.path });

    await task.transition('scanning');
    let source: string;
    try {
      source = await this.fs.readFile(task.path, 'utf8');
    } catch (error) {
      const scanError = new ScanError(`Read failed: ${errorMessage(error)}`, { cause: error });
      await fileLogger.error(scanError, scanError.message);
      return this.fail(task, 'io', scanError.message);
    }

    if (!hasLiteralOutsideComment(source)) {
      const reason = 'no literals outside comments';
      await task.transition('skipped', { reason });
      return { path: task.path, outcome: 'skipped', attempts: 0, reason };
    }

    const request: RewriteRequest = {
      path: task.path,
      source,
      model: this.settings.model,
      timeoutMs: run.timeoutMs,
    };
    const outcome = await this.callWithRetries(task, request, { runId, logger: fileLogger });

    if (outcome.kind === 'fatal') {
      return this.fail(task, 'fatal', outcome.cause.message);
    }
    if (outcome.kind === 'transient') {
      return this.fail(
        task,
        'transient',
        `Gave up after ${task.attempts} attempts: ${outcome.cause.message}`,
      );
    }

    await task.transition('committing');

    const warnings: string[] = [];
    for (const finding of checkRewrite(source, outcome.text, this.settings.validation)) {
      if (finding.mode === 'fatal') {
        const rejection = new ValidationError(finding.message, {
          details: { check: finding.check },
        });
        await fileLogger.error(rejection, `Rewrite rejected: ${finding.message}`);
        return this.fail(task, 'validation', finding.message);
      }
      warnings.push(finding.message);
      await fileLogger.warn(finding.message);
      await this.logger.log({
        type: 'ValidationWarning',
        ...eventBase(runId),
        payload: { path: task.path, check: finding.check, message: finding.message },
      });
    }

    let receipt: CommitReceipt;
    try {
      receipt = await this.writer.commit(task.path, outcome.text, run.policy);
    } catch (error) {
      return this.fail(task, 'commit', errorMessage(error));
    }

    await this.logger.log({
      type: 'FileCommitted',
      ...eventBase(runId),
      payload: { path: task.path, ...receipt },
    });
    await task.transition('written');

    return { path: task.path, outcome: 'written', attempts: task.attempts, receipt, warnings };
  }

  private async callWithRetries(
    task: FileTask,
    request: RewriteRequest,
    ctx: AdapterContext,
  ): Promise<RewriteOutcome> {
    const { run } = this.settings;
    for (let attempt = 1; ; attempt++) {
      await task.transition('calling');
      const outcome = await executeRewriteAttempt(this.adapter, request, ctx, attempt);
      if (outcome.kind !== 'transient' || attempt >= run.retries) {
        return outcome;
      }

      const delay = backoffDelay(attempt, run, outcome.cause);
      await task.transition('retrying', { reason: outcome.cause.message });
      await ctx.logger.debug(
        `Attempt ${attempt} failed (${outcome.cause.message}); retrying in ${delay}ms`,
      );
      await this.sleep(delay);
    }
  }

  private async fail(task: FileTask, kind: FailureKind, reason: string): Promise<FailedResult> {
    await task.transition('failed', { reason });
    return failed(task, kind, reason);
  }
}

function failed(task: FileTask, kind: FailureKind, reason: string): FailedResult {
  return { path: task.path, outcome: 'failed', attempts: task.attempts, kind, reason };
}
