/**
 * Base interface for all constify events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the refactoring run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Lifecycle states of a single file inside the task pipeline.
 */
export type FileTaskState =
  | 'pending'
  | 'scanning'
  | 'calling'
  | 'retrying'
  | 'committing'
  | 'skipped'
  | 'written'
  | 'failed';

/** Write-safety mode used to commit rewritten files. */
export type CommitPolicy = 'dry-run' | 'overwrite' | 'overwrite-with-backup';

/**
 * Emitted when a refactoring run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** Number of files handed to the pipeline */
    fileCount: number;
    workers: number;
    policy: CommitPolicy;
    model: string;
  };
}

/** Emitted once the source walker has produced its candidate list */
export interface FilesCollected extends BaseEvent {
  type: 'FilesCollected';
  payload: {
    root: string;
    fileCount: number;
    warnings: string[];
  };
}

/** Emitted on every per-file state transition */
export interface FileStateChanged extends BaseEvent {
  type: 'FileStateChanged';
  payload: {
    path: string;
    from: FileTaskState;
    to: FileTaskState;
    attempt?: number;
    reason?: string;
  };
}

/** Emitted before each attempt against the rewrite service */
export interface RewriteRequestStarted extends BaseEvent {
  type: 'RewriteRequestStarted';
  payload: {
    provider: string;
    model: string;
    path: string;
    attempt: number;
  };
}

/** Emitted after each attempt against the rewrite service, whatever its outcome */
export interface RewriteRequestFinished extends BaseEvent {
  type: 'RewriteRequestFinished';
  payload: {
    provider: string;
    path: string;
    attempt: number;
    durationMs: number;
    outcome: 'success' | 'transient' | 'fatal';
    error?: string;
  };
}

/** Emitted when a rewritten file has reached disk */
export interface FileCommitted extends BaseEvent {
  type: 'FileCommitted';
  payload: {
    path: string;
    policy: CommitPolicy;
    outputPath: string;
    backupPath?: string;
  };
}

/** Emitted when rewritten output trips a validation check that is set to warn */
export interface ValidationWarning extends BaseEvent {
  type: 'ValidationWarning';
  payload: {
    path: string;
    check: 'unchanged' | 'literals-dropped';
    message: string;
  };
}

/** Emitted when every file has a recorded result */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    skipped: number;
    written: number;
    failed: number;
    durationMs: number;
  };
}

/**
 * Union of all constify event types.
 * Use the `type` field to discriminate between event types.
 */
export type ConstifyEvent =
  | RunStarted
  | FilesCollected
  | FileStateChanged
  | RewriteRequestStarted
  | RewriteRequestFinished
  | FileCommitted
  | ValidationWarning
  | RunFinished;

export type ConstifyEventType = ConstifyEvent['type'];

/**
 * Common metadata for a new event stamped with the current time.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
  };
}
