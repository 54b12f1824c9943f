import { eventBase, FileTaskState, Logger } from '@constify/shared';

const TRANSITIONS: Record<FileTaskState, readonly FileTaskState[]> = {
  // pending -> failed only for files cancelled before dispatch
  pending: ['scanning', 'failed'],
  scanning: ['skipped', 'calling', 'failed'],
  calling: ['retrying', 'committing', 'failed'],
  retrying: ['calling'],
  committing: ['written', 'failed'],
  skipped: [],
  written: [],
  failed: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    public readonly path: string,
    public readonly from: FileTaskState,
    public readonly to: FileTaskState,
  ) {
    super(`Invalid transition for ${path}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function isTerminal(state: FileTaskState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Per-file state machine. Every transition is checked against the table
 * above and recorded as a `FileStateChanged` event.
 */
export class FileTask {
  private current: FileTaskState = 'pending';
  private attemptCount = 0;

  constructor(
    readonly path: string,
    private readonly runId: string,
    private readonly logger: Logger,
  ) {}

  get state(): FileTaskState {
    return this.current;
  }

  /** Number of rewrite attempts started so far */
  get attempts(): number {
    return this.attemptCount;
  }

  async transition(to: FileTaskState, details: { reason?: string } = {}): Promise<void> {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(this.path, from, to);
    }
    if (to === 'calling') {
      this.attemptCount++;
    }
    this.current = to;

    await this.logger.log({
      type: 'FileStateChanged',
      ...eventBase(this.runId),
      payload: {
        path: this.path,
        from,
        to,
        attempt: this.attemptCount > 0 ? this.attemptCount : undefined,
        reason: details.reason,
      },
    });
  }
}
