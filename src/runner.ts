// ---------------------------------------------------------------------------
// Cleanup runner
//
// Entry point for every trigger (schedule, HTTP, startup). Builds a fresh
// orchestrator per run, records the run in the store and allows at most one
// run in flight per process.
// ---------------------------------------------------------------------------

import type { Logger } from 'pino';
import type { CleanupOrchestrator } from './cleanup/orchestrator';
import type { CleanupPhase, RunSummary } from './cleanup/types';
import { RunInProgressError } from './errors';
import type { RunStore } from './run-store';
import type { RunTrigger } from './types';

export type OrchestratorFactory = (hooks: {
  onPhase: (phase: CleanupPhase) => Promise<void>;
}) => CleanupOrchestrator;

export interface StartedRun {
  runId: number | null;
  /** Resolves with the summary, or null when the run failed. Never rejects. */
  completion: Promise<RunSummary | null>;
}

export class CleanupRunner {
  private inFlight = false;
  private activeRunId: number | null = null;
  private current: Promise<RunSummary | null> | null = null;

  constructor(
    private readonly createOrchestrator: OrchestratorFactory,
    private readonly store: RunStore,
    private readonly logger: Logger,
    private readonly dryRun: boolean,
  ) {}

  get running(): boolean {
    return this.inFlight;
  }

  /**
   * Starts a run and returns once it is recorded.
   * @throws RunInProgressError when another run has not finished.
   */
  async start(trigger: RunTrigger): Promise<StartedRun> {
    if (this.inFlight) {
      throw new RunInProgressError(this.activeRunId);
    }
    this.inFlight = true;

    const recorded = this.safely('start run', null, () => this.store.startRun(trigger, this.dryRun));
    const completion = recorded
      .then((runId) => {
        this.activeRunId = runId;
        return this.execute(trigger, runId);
      })
      .finally(() => {
        this.inFlight = false;
        this.activeRunId = null;
        this.current = null;
      });
    this.current = completion;

    return { runId: await recorded, completion };
  }

  /**
   * Resolves once the run in flight, if any, has finished and been recorded.
   * Resolves with that run's summary, or null when there was none.
   */
  idle(): Promise<RunSummary | null> {
    return this.current ?? Promise.resolve(null);
  }

  /** Starts a run and waits for it to finish. */
  async trigger(trigger: RunTrigger): Promise<RunSummary | null> {
    const { completion } = await this.start(trigger);
    return completion;
  }

  private async execute(trigger: RunTrigger, runId: number | null): Promise<RunSummary | null> {
    const log = this.logger.child({ runId, trigger });
    log.info('Cleanup run started');

    try {
      const orchestrator = this.createOrchestrator({
        onPhase: async (phase) => {
          if (runId === null) return;
          await this.safely('record phase', undefined, () => this.store.recordPhase(runId, phase));
        },
      });
      const summary = await orchestrator.run();

      if (runId !== null) {
        await this.safely('complete run', undefined, () => this.store.completeRun(runId, summary));
      }
      log.info(
        {
          cutoff: summary.cutoff,
          candidates: summary.candidateCount,
          skipped: summary.skippedCount,
          succeeded: summary.succeededCount,
          failed: summary.failedCount,
          warnings: summary.warnings.length,
        },
        'Cleanup run completed',
      );
      return summary;
    } catch (err) {
      log.error({ err }, 'Cleanup run failed');
      if (runId !== null) {
        const message = err instanceof Error ? err.message : String(err);
        await this.safely('fail run', undefined, () => this.store.failRun(runId, message));
      }
      return null;
    }
  }

  private async safely<T, F>(action: string, fallback: F, write: () => Promise<T>): Promise<T | F> {
    try {
      return await write();
    } catch (err) {
      this.logger.error({ err, action }, `[run-store] Failed to ${action}`);
      return fallback;
    }
  }
}
