// ---------------------------------------------------------------------------
// Database row types
// ---------------------------------------------------------------------------

export type RunStatus = 'running' | 'completed' | 'failed';

export type RunTrigger = 'schedule' | 'manual' | 'startup';

export interface CleanupRunRow {
  id: number;
  trigger: string;
  status: string;
  phase: string;
  cutoff: string | null;
  /** SQLite stores booleans as 0/1 */
  dry_run: number | boolean;
  complete: number | boolean | null;
  protected_count: number | null;
  candidate_count: number | null;
  skipped_count: number | null;
  queued_count: number | null;
  succeeded_count: number | null;
  failed_count: number | null;
  failed_batches: number | null;
  /** CleanupWarning[] as JSON */
  warnings: string;
  error: string | null;
  started_at: string;
  finished_at: string | null;
}

export interface CleanupDeletionRow {
  id: number;
  run_id: number;
  user_id: string;
  correlation_id: string;
  batch_index: number;
  status: number | null;
  error: string | null;
  created_at: string;
}
