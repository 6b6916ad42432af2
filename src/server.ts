// ---------------------------------------------------------------------------
// Dormant account cleanup: entry point
// ---------------------------------------------------------------------------

import { buildApp } from './app';
import { createCleanupOrchestrator } from './cleanup/orchestrator';
import { loadConfig } from './config';
import { createDb, initDb } from './db';
import { GraphDirectoryClient } from './directory/graph-client';
import { ConfigurationError } from './errors';
import { resolveCredential } from './identity/credentials';
import { createLogger } from './logger';
import { RunStore } from './run-store';
import { CleanupRunner } from './runner';
import { runTriggered, startScheduler } from './scheduler';
import { LogTelemetry } from './telemetry';

async function start(): Promise<void> {
  // Configuration and credential errors are fatal before any directory call
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const credential = resolveCredential(config.identity);
  const client = GraphDirectoryClient.fromCredential(credential);
  const telemetry = new LogTelemetry(logger.child({ component: 'telemetry' }));

  // ── Database ──────────────────────────────────────────────────────────────
  const db = createDb(config.databaseFile);
  await initDb(db);
  logger.info({ file: config.databaseFile }, 'Database initialised');
  const store = new RunStore(db);
  const interrupted = await store.failInterruptedRuns();
  if (interrupted > 0) {
    logger.warn({ interrupted }, 'Marked runs interrupted by a previous shutdown as failed');
  }

  // ── Runner + schedule ─────────────────────────────────────────────────────
  const runner = new CleanupRunner(
    ({ onPhase }) => createCleanupOrchestrator({ config, client, logger, telemetry, onPhase }),
    store,
    logger.child({ component: 'runner' }),
    config.cleanup.dryRun,
  );
  const scheduler = startScheduler(runner, config.schedule, logger.child({ component: 'scheduler' }));

  // ── HTTP ──────────────────────────────────────────────────────────────────
  const server = await buildApp({ logger, runner, store, apiKey: config.server.apiKey });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    scheduler.stop();
    await server.close();
    if (runner.running) {
      logger.info('Waiting for the cleanup run in flight to finish');
    }
    await runner.idle();
    await db.destroy();
  };
  for (const signal of ['SIGINT', 'SIGTERM']) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exitCode = 1;
      });
    });
  }

  try {
    await server.listen({ port: config.server.port, host: '0.0.0.0' });
  } catch (err) {
    server.log.error({ err }, 'HTTP listener failed to start');
    process.exit(1);
  }

  if (config.schedule.runOnStartup) {
    await runTriggered(runner, logger.child({ component: 'scheduler' }), 'startup');
  }
}

start().catch((err: unknown) => {
  const logger = createLogger(process.env.LOG_LEVEL ?? 'info');
  logger.fatal({ err }, err instanceof ConfigurationError ? 'Invalid configuration' : 'Startup failed');
  process.exit(1);
});
