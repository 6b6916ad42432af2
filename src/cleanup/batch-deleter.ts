// ---------------------------------------------------------------------------
// Batched account deletion
//
// Candidates are cut into consecutive batches of at most 20 delete requests,
// each request tagged with a fresh correlation key. Every batch is an
// independent unit of work: a batch whose request fails is recorded and the
// next one is still attempted.
// ---------------------------------------------------------------------------

import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { MAX_BATCH_SIZE, type BatchOperation, type DirectoryClient } from '../directory/types';
import { describeDirectoryError, isSuccessStatus } from '../graph-errors';
import { TelemetryEvents, type TelemetrySink } from '../telemetry';
import type { Sleep } from '../throttle';
import type { BatchReport, CleanupWarning, DeletionReport, Outcome, QueuedDeletion } from './types';

export interface BatchDeleterOptions {
  batchSize: number;
  batchDelayMs: number;
  dryRun: boolean;
  sleep: Sleep;
  newCorrelationId?: () => string;
}

export function toDeleteOperation({ correlationId, userId }: QueuedDeletion): BatchOperation {
  return { id: correlationId, method: 'DELETE', url: `/users/${encodeURIComponent(userId)}` };
}

export class BatchDeleter {
  private readonly batchSize: number;
  private readonly newCorrelationId: () => string;

  constructor(
    private readonly client: DirectoryClient,
    private readonly logger: Logger,
    private readonly telemetry: TelemetrySink,
    private readonly options: BatchDeleterOptions,
  ) {
    this.batchSize = Math.min(Math.max(1, options.batchSize), MAX_BATCH_SIZE);
    this.newCorrelationId = options.newCorrelationId ?? uuidv4;
  }

  /** Never rejects; failures are returned as warnings. */
  async deleteAll(ids: readonly string[]): Promise<Outcome<DeletionReport>> {
    const batches: BatchReport[] = [];
    const warnings: CleanupWarning[] = [];
    let pending: QueuedDeletion[] = [];

    for (const [index, userId] of ids.entries()) {
      pending.push({ correlationId: this.newCorrelationId(), userId });
      if (this.options.dryRun) {
        this.logger.info({ userId }, `Dry run: the user ${userId} would be deleted`);
      } else {
        this.logger.info({ userId }, `The user ${userId} will be deleted`);
        this.telemetry.trackEvent(TelemetryEvents.userDeleted, { userId });
      }

      const isLast = index === ids.length - 1;
      if (pending.length < this.batchSize && !isLast) continue;

      batches.push(await this.submit(batches.length, pending, warnings));
      pending = [];

      if (!isLast && !this.options.dryRun) {
        await this.options.sleep(this.options.batchDelayMs);
      }
    }

    return { value: summarize(ids.length, batches), warnings };
  }

  private async submit(
    index: number,
    operations: QueuedDeletion[],
    warnings: CleanupWarning[],
  ): Promise<BatchReport> {
    const report: BatchReport = { index, operations, status: 'skipped', error: null, results: [] };

    if (this.options.dryRun) {
      this.logger.info({ batch: index, size: operations.length }, 'Dry run: batch not submitted');
      return report;
    }

    try {
      report.results = await this.client.submitBatch(operations.map(toDeleteOperation));
      report.status = 'accepted';
    } catch (err) {
      const { status, code, detail } = describeDirectoryError(err);
      this.logger.error({ err, batch: index, status, code }, `Batch operation failed: ${detail}`);
      warnings.push({
        stage: 'batch-submission',
        message: detail,
        context: { batch: index, size: operations.length },
      });
      report.status = 'failed';
      report.error = detail;
      return report;
    }

    const byCorrelationId = new Map(report.results.map((result) => [result.id, result]));
    let succeeded = 0;

    for (const { correlationId, userId } of operations) {
      const result = byCorrelationId.get(correlationId);
      if (result && isSuccessStatus(result.status)) {
        succeeded++;
        continue;
      }

      const message = result
        ? `Delete of user ${userId} returned status ${result.status}`
        : `No result returned for the delete of user ${userId}`;
      this.logger.warn({ batch: index, userId, correlationId, status: result?.status }, message);
      warnings.push({
        stage: 'batch-operation',
        message,
        context: { batch: index, userId, status: result?.status ?? 0 },
      });
    }

    this.telemetry.trackEvent(TelemetryEvents.batchCompleted, undefined, {
      size: operations.length,
      succeeded,
      failed: operations.length - succeeded,
    });

    return report;
  }
}

function summarize(queued: number, batches: BatchReport[]): DeletionReport {
  let succeeded = 0;
  let failed = 0;
  let failedBatches = 0;

  for (const batch of batches) {
    if (batch.status === 'skipped') continue;
    if (batch.status === 'failed') {
      failedBatches++;
      failed += batch.operations.length;
      continue;
    }

    const ok = new Set(
      batch.results.filter((result) => isSuccessStatus(result.status)).map((result) => result.id),
    );
    for (const operation of batch.operations) {
      if (ok.has(operation.correlationId)) {
        succeeded++;
      } else {
        failed++;
      }
    }
  }

  return { batches, queued, succeeded, failed, failedBatches };
}
