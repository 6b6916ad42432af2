import { describe, it, expect } from 'vitest';
import { GraphError } from '@microsoft/microsoft-graph-client';
import { InvalidStateError } from '../errors';
import { TelemetryEvents } from '../telemetry';
import {
  FakeDirectoryClient,
  RecordingTelemetry,
  accounts,
  numberedAccounts,
  recordingSleep,
  silentLogger,
  testConfig,
} from '../test-support/fakes';
import { CLEANUP_OPERATION, createCleanupOrchestrator } from './orchestrator';
import type { CleanupPhase } from './types';

const NOW = new Date('2024-03-31T12:34:56.789Z');

function setup(cleanup: Parameters<typeof testConfig>[0] = {}) {
  const client = new FakeDirectoryClient();
  const telemetry = new RecordingTelemetry();
  const { sleep, delays } = recordingSleep();
  const phases: CleanupPhase[] = [];
  const orchestrator = createCleanupOrchestrator({
    config: testConfig(cleanup),
    client,
    logger: silentLogger,
    telemetry,
    sleep,
    now: () => NOW,
    onPhase: (phase) => {
      phases.push(phase);
    },
  });
  return { client, telemetry, delays, phases, orchestrator };
}

describe('CleanupOrchestrator', () => {
  it('deletes 25 unprotected dormant accounts in two paced batches', async () => {
    const { client, delays, orchestrator } = setup();
    client.userPages = [numberedAccounts('u', 25)];

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({
      cutoff: '2024-03-01T12:34:56Z',
      protectedCount: 0,
      candidateCount: 25,
      skippedCount: 0,
      queuedCount: 25,
      succeededCount: 25,
      failedCount: 0,
      failedBatches: 0,
      complete: true,
      dryRun: false,
      warnings: [],
    });
    expect(client.batches.map((batch) => batch.length)).toEqual([20, 5]);
    expect(delays).toEqual([3000]);
  });

  it('treats every dormant account as a candidate when no group is configured', async () => {
    const { client, orchestrator } = setup();
    client.userPages = [accounts('a', 'b', 'c')];

    const summary = await orchestrator.run();

    expect(client.calls.some((call) => call.startsWith('listGroupMembers'))).toBe(false);
    expect(summary.candidateCount).toBe(3);
    expect(summary.skippedCount).toBe(0);
  });

  it('skips an account that is in both protected groups exactly once', async () => {
    const { client, orchestrator } = setup({
      adminGroupId: 'group-admins',
      exclusiveDemosGroupId: 'group-demos',
    });
    client.groupPages.set('group-admins', [accounts('shared', 'admin-1')]);
    client.groupPages.set('group-demos', [accounts('shared', 'demo-1')]);
    client.userPages = [accounts('shared', 'admin-1', 'demo-1', 'u-1', 'u-2')];

    const summary = await orchestrator.run();

    expect(summary.protectedCount).toBe(3);
    expect(summary.skippedCount).toBe(3);
    expect(summary.candidateCount).toBe(2);
    expect(client.batches[0].map((operation) => operation.url)).toEqual(['/users/u-1', '/users/u-2']);
  });

  it('moves through the phases in order', async () => {
    const { client, phases, orchestrator } = setup({ adminGroupId: 'group-admins' });
    client.userPages = [accounts('a')];

    expect(orchestrator.phase).toBe('idle');
    await orchestrator.run();

    expect(phases).toEqual(['building-exclusions', 'scanning', 'deleting', 'done']);
    expect(orchestrator.phase).toBe('done');
    expect(client.calls).toEqual(['listGroupMembers:group-admins', 'listUsers', 'submitBatch:0']);
  });

  it('reports no deletions in a dry run', async () => {
    const { client, telemetry, delays, orchestrator } = setup({ dryRun: true });
    client.userPages = [accounts('a', 'b', 'c')];

    const summary = await orchestrator.run();

    expect(client.batches).toEqual([]);
    expect(delays).toEqual([]);
    expect(telemetry.named(TelemetryEvents.userDeleted)).toEqual([]);
    expect(summary).toMatchObject({ dryRun: true, candidateCount: 3, queuedCount: 3, succeededCount: 0 });
  });

  it('refuses to run twice', async () => {
    const { orchestrator } = setup();
    await orchestrator.run();

    await expect(orchestrator.run()).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('wraps the run in one operation span', async () => {
    const { telemetry, orchestrator } = setup();

    await orchestrator.run();

    expect(telemetry.spans).toEqual([{ name: CLEANUP_OPERATION, success: true }]);
    expect(telemetry.named(TelemetryEvents.runCompleted)).toHaveLength(1);
  });

  it('ends the span as failed when a stage throws', async () => {
    const telemetry = new RecordingTelemetry();
    const orchestrator = createCleanupOrchestrator({
      config: testConfig(),
      client: new FakeDirectoryClient(),
      logger: silentLogger,
      telemetry,
      sleep: recordingSleep().sleep,
      onPhase: (phase) => {
        if (phase === 'scanning') throw new Error('phase hook failed');
      },
    });

    await expect(orchestrator.run()).rejects.toThrow('phase hook failed');
    expect(telemetry.spans).toEqual([{ name: CLEANUP_OPERATION, success: false }]);
  });

  it('collects the warnings of every stage', async () => {
    const { client, orchestrator } = setup({ adminGroupId: 'group-bad' });
    client.groupPages.set('group-bad', [new GraphError(403, 'Authorization_RequestDenied')]);
    client.userPages = [numberedAccounts('u', 21)];
    client.failingBatches.add(0);

    const summary = await orchestrator.run();

    expect(summary.warnings.map((warning) => warning.stage)).toEqual(['group-resolution', 'batch-submission']);
    expect(summary).toMatchObject({ succeededCount: 1, failedCount: 20, failedBatches: 1 });
  });
});
