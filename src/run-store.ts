// ---------------------------------------------------------------------------
// Run history
//
// Persists one row per cleanup run and one audit row per queued deletion.
// The store is a record of what happened; the run itself never depends on
// a write here succeeding.
// ---------------------------------------------------------------------------

import type { Knex } from 'knex';
import { z } from 'zod';
import type { CleanupPhase, CleanupWarning, RunSummary } from './cleanup/types';
import type {
  CleanupDeletionRow,
  CleanupRunRow,
  RunStatus,
  RunTrigger,
} from './types';

const INSERT_CHUNK = 100;

export const INTERRUPTED_ERROR = 'Interrupted before completion';

const triggerSchema = z.enum(['schedule', 'manual', 'startup']);
const statusSchema = z.enum(['running', 'completed', 'failed']);
const phaseSchema = z.enum(['idle', 'building-exclusions', 'scanning', 'deleting', 'done']);
const warningsSchema = z.array(
  z.object({
    stage: z.enum(['group-resolution', 'scan-paging', 'batch-submission', 'batch-operation']),
    message: z.string(),
    context: z.record(z.union([z.string(), z.number()])).optional(),
  }),
);

export interface RunCounts {
  protected: number;
  candidates: number;
  skipped: number;
  queued: number;
  succeeded: number;
  failed: number;
  failedBatches: number;
}

export interface RunRecord {
  id: number;
  trigger: RunTrigger;
  status: RunStatus;
  phase: CleanupPhase;
  cutoff: string | null;
  dryRun: boolean;
  complete: boolean | null;
  /** Null until the run completes. */
  counts: RunCounts | null;
  warnings: CleanupWarning[];
  error: string | null;
  startedAt: string;
  finishedAt: string | null;
}

export interface DeletionRecord {
  userId: string;
  correlationId: string;
  batchIndex: number;
  status: number | null;
  error: string | null;
}

export interface RunDetail extends RunRecord {
  deletions: DeletionRecord[];
}

export class RunStore {
  constructor(
    private readonly db: Knex,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async startRun(trigger: RunTrigger, dryRun: boolean): Promise<number> {
    const [id] = await this.db('cleanup_runs').insert({
      trigger,
      status: 'running',
      phase: 'idle',
      dry_run: dryRun ? 1 : 0,
      started_at: this.now(),
    });
    return id;
  }

  async recordPhase(runId: number, phase: CleanupPhase): Promise<void> {
    await this.db('cleanup_runs').where({ id: runId }).update({ phase });
  }

  async completeRun(runId: number, summary: RunSummary): Promise<void> {
    const createdAt = this.now();
    const deletions = summary.batches.flatMap((batch) => {
      const results = new Map(batch.results.map((result) => [result.id, result.status]));
      return batch.operations.map((operation) => {
        const status = results.get(operation.correlationId) ?? null;
        let error: string | null = batch.error;
        if (batch.status === 'accepted' && status === null) {
          error = 'No result returned';
        }
        return {
          run_id: runId,
          user_id: operation.userId,
          correlation_id: operation.correlationId,
          batch_index: batch.index,
          status,
          error,
          created_at: createdAt,
        };
      });
    });

    await this.db.transaction(async (trx) => {
      await trx('cleanup_runs')
        .where({ id: runId })
        .update({
          status: 'completed',
          phase: 'done',
          cutoff: summary.cutoff,
          complete: summary.complete ? 1 : 0,
          protected_count: summary.protectedCount,
          candidate_count: summary.candidateCount,
          skipped_count: summary.skippedCount,
          queued_count: summary.queuedCount,
          succeeded_count: summary.succeededCount,
          failed_count: summary.failedCount,
          failed_batches: summary.failedBatches,
          warnings: JSON.stringify(summary.warnings),
          finished_at: createdAt,
        });

      for (let i = 0; i < deletions.length; i += INSERT_CHUNK) {
        await trx('cleanup_deletions').insert(deletions.slice(i, i + INSERT_CHUNK));
      }
    });
  }

  async failRun(runId: number, error: string): Promise<void> {
    await this.db('cleanup_runs')
      .where({ id: runId })
      .update({
        status: 'failed',
        error: error.substring(0, 2000),
        finished_at: this.now(),
      });
  }

  /**
   * Marks runs left `running` by a previous process as failed. Returns how
   * many rows were changed.
   */
  async failInterruptedRuns(): Promise<number> {
    const changed = await this.db('cleanup_runs')
      .where({ status: 'running' })
      .update({
        status: 'failed',
        error: INTERRUPTED_ERROR,
        finished_at: this.now(),
      });
    return changed;
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const rows = await this.db<CleanupRunRow>('cleanup_runs')
      .orderBy('id', 'desc')
      .limit(limit)
      .select();
    return rows.map((row) => rowToRecord(row));
  }

  async getRun(id: number): Promise<RunDetail | null> {
    const row = await this.db<CleanupRunRow>('cleanup_runs').where({ id }).first();
    if (!row) return null;

    const deletions = await this.db<CleanupDeletionRow>('cleanup_deletions')
      .where({ run_id: id })
      .orderBy('id', 'asc')
      .select();

    return {
      ...rowToRecord(row),
      deletions: deletions.map((d) => ({
        userId: d.user_id,
        correlationId: d.correlation_id,
        batchIndex: d.batch_index,
        status: d.status,
        error: d.error,
      })),
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function rowToRecord(row: CleanupRunRow): RunRecord {
  const counts: RunCounts | null =
    row.status === 'completed'
      ? {
          protected: row.protected_count ?? 0,
          candidates: row.candidate_count ?? 0,
          skipped: row.skipped_count ?? 0,
          queued: row.queued_count ?? 0,
          succeeded: row.succeeded_count ?? 0,
          failed: row.failed_count ?? 0,
          failedBatches: row.failed_batches ?? 0,
        }
      : null;

  return {
    id: row.id,
    trigger: triggerSchema.parse(row.trigger),
    status: statusSchema.parse(row.status),
    phase: phaseSchema.parse(row.phase),
    cutoff: row.cutoff,
    dryRun: Boolean(row.dry_run),
    complete: row.complete === null ? null : Boolean(row.complete),
    counts,
    warnings: warningsSchema.parse(JSON.parse(row.warnings)),
    error: row.error,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}
