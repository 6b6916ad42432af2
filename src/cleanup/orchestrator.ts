// ---------------------------------------------------------------------------
// Cleanup run orchestration
//
//   idle → building-exclusions → scanning → deleting → done
//
// One orchestrator drives exactly one run. Nothing is carried between runs:
// the next run gets a fresh instance, cutoff, exclusion set and candidates.
// ---------------------------------------------------------------------------

import type { Logger } from 'pino';
import type { AppConfig } from '../config';
import type { DirectoryClient } from '../directory/types';
import { InvalidStateError } from '../errors';
import { TelemetryEvents, type TelemetrySink } from '../telemetry';
import { sleep as defaultSleep, throttleFromConfig, type Sleep } from '../throttle';
import { BatchDeleter } from './batch-deleter';
import { ExclusionSetBuilder } from './exclusion-set';
import { DormantAccountScanner } from './scanner';
import type { CleanupPhase, RunSummary } from './types';

export const CLEANUP_OPERATION = 'CleanUpDormantAccounts';

export interface CleanupComponents {
  exclusions: ExclusionSetBuilder;
  scanner: DormantAccountScanner;
  deleter: BatchDeleter;
}

export interface OrchestratorOptions {
  adminGroupId: string | null;
  exclusiveDemosGroupId: string | null;
  dryRun: boolean;
  /** Awaited on every phase transition. */
  onPhase?: (phase: CleanupPhase) => void | Promise<void>;
}

export class CleanupOrchestrator {
  private currentPhase: CleanupPhase = 'idle';

  constructor(
    private readonly components: CleanupComponents,
    private readonly options: OrchestratorOptions,
    private readonly logger: Logger,
    private readonly telemetry: TelemetrySink,
  ) {}

  get phase(): CleanupPhase {
    return this.currentPhase;
  }

  async run(): Promise<RunSummary> {
    if (this.currentPhase !== 'idle') {
      throw new InvalidStateError(`This cleanup run has already started (phase: ${this.currentPhase}).`);
    }

    const span = this.telemetry.startOperation(CLEANUP_OPERATION);
    let success = false;

    try {
      await this.enter('building-exclusions');
      const exclusions = await this.components.exclusions.build([
        this.options.adminGroupId,
        this.options.exclusiveDemosGroupId,
      ]);

      await this.enter('scanning');
      const scan = await this.components.scanner.scan(exclusions.value);

      await this.enter('deleting');
      const deletion = await this.components.deleter.deleteAll(scan.value.candidates);

      await this.enter('done');

      const summary: RunSummary = {
        cutoff: scan.value.cutoff,
        protectedCount: exclusions.value.size,
        candidateCount: scan.value.candidates.length,
        skippedCount: scan.value.skippedCount,
        queuedCount: deletion.value.queued,
        succeededCount: deletion.value.succeeded,
        failedCount: deletion.value.failed,
        failedBatches: deletion.value.failedBatches,
        complete: scan.value.complete,
        dryRun: this.options.dryRun,
        warnings: [...exclusions.warnings, ...scan.warnings, ...deletion.warnings],
        batches: deletion.value.batches,
      };

      this.telemetry.trackEvent(
        TelemetryEvents.runCompleted,
        { cutoff: summary.cutoff, complete: String(summary.complete) },
        {
          protected: summary.protectedCount,
          candidates: summary.candidateCount,
          skipped: summary.skippedCount,
          succeeded: summary.succeededCount,
          failed: summary.failedCount,
          warnings: summary.warnings.length,
        },
      );

      success = true;
      return summary;
    } finally {
      span.end(success);
    }
  }

  private async enter(phase: CleanupPhase): Promise<void> {
    this.logger.debug({ from: this.currentPhase, to: phase }, 'Cleanup phase transition');
    this.currentPhase = phase;
    if (this.options.onPhase) {
      await this.options.onPhase(phase);
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface OrchestratorDeps {
  config: AppConfig;
  client: DirectoryClient;
  logger: Logger;
  telemetry: TelemetrySink;
  sleep?: Sleep;
  now?: () => Date;
  onPhase?: OrchestratorOptions['onPhase'];
}

/** Wires a fresh orchestrator and its components for one run. */
export function createCleanupOrchestrator({
  config,
  client,
  logger,
  telemetry,
  sleep = defaultSleep,
  now,
  onPhase,
}: OrchestratorDeps): CleanupOrchestrator {
  const { cleanup } = config;
  const throttle = throttleFromConfig(cleanup);

  const components: CleanupComponents = {
    exclusions: new ExclusionSetBuilder(
      client,
      logger.child({ component: 'exclusion-set' }),
      telemetry,
      { pageSize: cleanup.groupPageSize },
    ),
    scanner: new DormantAccountScanner(client, logger.child({ component: 'scanner' }), telemetry, {
      inactivityDays: cleanup.inactivityDays,
      pageDelayMs: throttle.pageDelayMs,
      sleep,
      now,
    }),
    deleter: new BatchDeleter(client, logger.child({ component: 'batch-deleter' }), telemetry, {
      batchSize: throttle.batchSize,
      batchDelayMs: throttle.batchDelayMs,
      dryRun: cleanup.dryRun,
      sleep,
    }),
  };

  return new CleanupOrchestrator(
    components,
    {
      adminGroupId: cleanup.adminGroupId,
      exclusiveDemosGroupId: cleanup.exclusiveDemosGroupId,
      dryRun: cleanup.dryRun,
      onPhase,
    },
    logger.child({ component: 'orchestrator' }),
    telemetry,
  );
}
