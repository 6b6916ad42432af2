import { schedule } from 'node-cron';
import type { Logger } from 'pino';
import type { ScheduleConfig } from './config';
import { RunInProgressError } from './errors';
import type { CleanupRunner } from './runner';
import type { RunTrigger } from './types';

export interface SchedulerHandle {
  stop(): void;
}

/**
 * Runs one cleanup for a timer or startup trigger. A tick that lands while a
 * run is still in flight is skipped.
 */
export async function runTriggered(
  runner: CleanupRunner,
  logger: Logger,
  trigger: RunTrigger,
): Promise<void> {
  logger.info({ trigger }, `Timer trigger function executed at: ${new Date().toISOString()}`);

  try {
    await runner.trigger(trigger);
  } catch (err) {
    if (err instanceof RunInProgressError) {
      logger.warn({ runId: err.runId }, 'Skipping cleanup: the previous run is still in progress');
      return;
    }
    logger.error({ err }, 'Cleanup trigger failed');
  }
}

export function startScheduler(
  runner: CleanupRunner,
  config: ScheduleConfig,
  logger: Logger,
): SchedulerHandle {
  const task = schedule(
    config.expression,
    () => {
      void runTriggered(runner, logger, 'schedule');
    },
    { timezone: config.timezone },
  );

  logger.info(
    { schedule: config.expression, timezone: config.timezone },
    'Cleanup schedule registered',
  );

  return {
    stop: () => {
      task.stop();
    },
  };
}
