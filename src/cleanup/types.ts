// ---------------------------------------------------------------------------
// Cleanup workflow types
// ---------------------------------------------------------------------------

import type { BatchOperationResult } from '../directory/types';

export type CleanupPhase = 'idle' | 'building-exclusions' | 'scanning' | 'deleting' | 'done';

export type WarningStage =
  | 'group-resolution'
  | 'scan-paging'
  | 'batch-submission'
  | 'batch-operation';

/** A failure the run recovered from. */
export interface CleanupWarning {
  stage: WarningStage;
  message: string;
  context?: Record<string, string | number>;
}

/** A stage result together with the failures it absorbed. */
export interface Outcome<T> {
  value: T;
  warnings: CleanupWarning[];
}

export type ProtectedAccountSet = ReadonlySet<string>;

export interface ScanResult {
  /** ISO-8601 UTC, second precision. */
  cutoff: string;
  /** Account IDs in enumeration order. */
  candidates: string[];
  skippedCount: number;
  pagesRead: number;
  /** False when paging stopped on an error. */
  complete: boolean;
}

export interface QueuedDeletion {
  correlationId: string;
  userId: string;
}

export type BatchStatus = 'accepted' | 'failed' | 'skipped';

export interface BatchReport {
  index: number;
  operations: QueuedDeletion[];
  /** accepted: the request succeeded; failed: it threw; skipped: dry run. */
  status: BatchStatus;
  error: string | null;
  /** Per-operation results, in the order the backend returned them. */
  results: BatchOperationResult[];
}

export interface DeletionReport {
  batches: BatchReport[];
  queued: number;
  succeeded: number;
  failed: number;
  failedBatches: number;
}

export interface RunSummary {
  cutoff: string;
  protectedCount: number;
  candidateCount: number;
  skippedCount: number;
  queuedCount: number;
  succeededCount: number;
  failedCount: number;
  failedBatches: number;
  /** False when the scan stopped early. */
  complete: boolean;
  dryRun: boolean;
  warnings: CleanupWarning[];
  batches: BatchReport[];
}
