import { randomUUID } from 'crypto';
import { BackupState, RunStatus } from '../types/index.js';
import { isBackupError, type ErrorKind } from '../lib/errors.js';

export interface EnumerationWarning {
  /** Path relative to the backup root */
  path: string;
  message: string;
}

export interface RunSummary {
  batchCount: number;
  fileCount: number;
  totalBytes: number;
  uploadedBatches: number;
  skippedBatches: number;
  warnings: EnumerationWarning[];
  durationMs: number;
}

export interface RunResult {
  runId: string;
  dayKey: string;
  status: RunStatus;
  /** State the run ended in */
  state: BackupState;
  cancelled: boolean;
  summary: RunSummary;
  error?: {
    kind: ErrorKind | 'Unknown';
    message: string;
  };
}

export interface BackupRun {
  /** UUID for this run */
  id: string;

  dayKey: string;

  rootPath: string;

  state: BackupState;

  /** States visited, in order */
  history: BackupState[];

  batchCount: number;
  fileCount: number;
  totalBytes: number;
  uploadedBatches: number;
  skippedBatches: number;
  warnings: EnumerationWarning[];

  cancelled: boolean;

  startTime: Date;
  endTime: Date | null;
  error: Error | null;
}

const TRANSITIONS: Record<BackupState, readonly BackupState[]> = {
  [BackupState.IDLE]: [BackupState.ENUMERATING],
  [BackupState.ENUMERATING]: [BackupState.BATCHING_NEXT],
  [BackupState.BATCHING_NEXT]: [
    BackupState.BATCHING_NEXT,
    BackupState.ARCHIVING,
    BackupState.MANIFEST_COMMITTING,
    BackupState.DAY_COMPLETE,
    BackupState.IDLE,
  ],
  [BackupState.ARCHIVING]: [BackupState.UPLOADING],
  [BackupState.UPLOADING]: [BackupState.MANIFEST_COMMITTING],
  [BackupState.MANIFEST_COMMITTING]: [BackupState.BATCHING_NEXT, BackupState.DAY_COMPLETE, BackupState.IDLE],
  [BackupState.DAY_COMPLETE]: [BackupState.IDLE],
  [BackupState.ABORTED]: [],
};

export function canTransition(from: BackupState, to: BackupState): boolean {
  // Any live state may abort
  if (to === BackupState.ABORTED) {
    return from !== BackupState.ABORTED;
  }
  return TRANSITIONS[from].includes(to);
}

export function createBackupRun(rootPath: string, dayKey: string): BackupRun {
  return {
    id: randomUUID(),
    dayKey,
    rootPath,
    state: BackupState.IDLE,
    history: [BackupState.IDLE],
    batchCount: 0,
    fileCount: 0,
    totalBytes: 0,
    uploadedBatches: 0,
    skippedBatches: 0,
    warnings: [],
    cancelled: false,
    startTime: new Date(),
    endTime: null,
    error: null,
  };
}

export function transition(run: BackupRun, next: BackupState): void {
  if (!canTransition(run.state, next)) {
    throw new Error(`Illegal state transition ${run.state} -> ${next}`);
  }
  run.state = next;
  run.history.push(next);
}

export function markRunAborted(run: BackupRun, error: Error): void {
  if (run.state !== BackupState.ABORTED) {
    transition(run, BackupState.ABORTED);
  }
  run.error = error;
  run.endTime = new Date();
}

export function markRunFinished(run: BackupRun): void {
  run.endTime = new Date();
}

export function toRunResult(run: BackupRun): RunResult {
  const endTime = run.endTime ?? new Date();
  let status: RunStatus;

  if (run.error) {
    status = RunStatus.FAILED;
  } else if (run.cancelled || run.warnings.length > 0) {
    status = RunStatus.PARTIAL;
  } else {
    status = RunStatus.SUCCESS;
  }

  const result: RunResult = {
    runId: run.id,
    dayKey: run.dayKey,
    status,
    state: run.state,
    cancelled: run.cancelled,
    summary: {
      batchCount: run.batchCount,
      fileCount: run.fileCount,
      totalBytes: run.totalBytes,
      uploadedBatches: run.uploadedBatches,
      skippedBatches: run.skippedBatches,
      warnings: [...run.warnings],
      durationMs: endTime.getTime() - run.startTime.getTime(),
    },
  };

  if (run.error) {
    result.error = {
      kind: isBackupError(run.error) ? run.error.kind : 'Unknown',
      message: run.error.message,
    };
  }

  return result;
}
