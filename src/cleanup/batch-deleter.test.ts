import { describe, it, expect } from 'vitest';
import { TelemetryEvents } from '../telemetry';
import {
  FakeDirectoryClient,
  RecordingTelemetry,
  recordingSleep,
  silentLogger,
} from '../test-support/fakes';
import { BatchDeleter, type BatchDeleterOptions } from './batch-deleter';

function userIds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `u-${i + 1}`);
}

function setup(overrides: Partial<BatchDeleterOptions> = {}) {
  const client = new FakeDirectoryClient();
  const telemetry = new RecordingTelemetry();
  const { sleep, delays } = recordingSleep();
  let next = 0;
  const deleter = new BatchDeleter(client, silentLogger, telemetry, {
    batchSize: 20,
    batchDelayMs: 3000,
    dryRun: false,
    sleep,
    newCorrelationId: () => `c-${++next}`,
    ...overrides,
  });
  return { client, telemetry, delays, deleter };
}

describe('BatchDeleter', () => {
  it('submits 25 candidates as 20 + 5 with one pause between them', async () => {
    const { client, delays, deleter } = setup();

    const outcome = await deleter.deleteAll(userIds(25));

    expect(client.batches.map((batch) => batch.length)).toEqual([20, 5]);
    expect(client.batches[0][0]).toEqual({ id: 'c-1', method: 'DELETE', url: '/users/u-1' });
    expect(client.batches[1][4]).toEqual({ id: 'c-25', method: 'DELETE', url: '/users/u-25' });
    expect(delays).toEqual([3000]);
    expect(outcome.value).toMatchObject({ queued: 25, succeeded: 25, failed: 0, failedBatches: 0 });
    expect(outcome.warnings).toEqual([]);
  });

  it.each([
    [0, []],
    [1, [1]],
    [19, [19]],
    [20, [20]],
    [21, [20, 1]],
    [40, [20, 20]],
    [41, [20, 20, 1]],
  ])('cuts %i candidates into batches of %j', async (count, sizes) => {
    const { client, delays, deleter } = setup();

    await deleter.deleteAll(userIds(count));

    expect(client.batches.map((batch) => batch.length)).toEqual(sizes);
    expect(delays).toHaveLength(Math.max(0, sizes.length - 1));
  });

  it('honours a smaller batch size and caps larger ones at 20', async () => {
    const small = setup({ batchSize: 5 });
    await small.deleter.deleteAll(userIds(12));
    expect(small.client.batches.map((batch) => batch.length)).toEqual([5, 5, 2]);

    const large = setup({ batchSize: 50 });
    await large.deleter.deleteAll(userIds(45));
    expect(large.client.batches.map((batch) => batch.length)).toEqual([20, 20, 5]);
  });

  it('keeps going after a batch submission fails', async () => {
    const { client, delays, deleter } = setup();
    client.failingBatches.add(1);

    const outcome = await deleter.deleteAll(userIds(60));

    expect(client.calls).toEqual(['submitBatch:0', 'submitBatch:1', 'submitBatch:2']);
    expect(delays).toEqual([3000, 3000]);
    expect(outcome.value.batches.map((batch) => batch.status)).toEqual(['accepted', 'failed', 'accepted']);
    expect(outcome.value.batches[1].error).toBe('Service unavailable');
    expect(outcome.value).toMatchObject({ queued: 60, succeeded: 40, failed: 20, failedBatches: 1 });
    expect(outcome.warnings).toEqual([
      { stage: 'batch-submission', message: 'Service unavailable', context: { batch: 1, size: 20 } },
    ]);
  });

  it('exposes per-operation results inside an accepted batch', async () => {
    const { client, telemetry, deleter } = setup();
    client.batchResults = () => [
      { id: 'c-1', status: 204 },
      { id: 'c-2', status: 404 },
    ];

    const outcome = await deleter.deleteAll(['u-1', 'u-2', 'u-3']);

    expect(outcome.value.batches[0].results).toEqual([
      { id: 'c-1', status: 204 },
      { id: 'c-2', status: 404 },
    ]);
    expect(outcome.value).toMatchObject({ queued: 3, succeeded: 1, failed: 2, failedBatches: 0 });
    expect(outcome.warnings).toEqual([
      {
        stage: 'batch-operation',
        message: 'Delete of user u-2 returned status 404',
        context: { batch: 0, userId: 'u-2', status: 404 },
      },
      {
        stage: 'batch-operation',
        message: 'No result returned for the delete of user u-3',
        context: { batch: 0, userId: 'u-3', status: 0 },
      },
    ]);
    expect(telemetry.named(TelemetryEvents.batchCompleted)[0].measurements).toEqual({
      size: 3,
      succeeded: 1,
      failed: 2,
    });
  });

  it('emits a deleted event for every queued account', async () => {
    const { telemetry, deleter } = setup();

    await deleter.deleteAll(['u-1', 'u-2']);

    expect(telemetry.named(TelemetryEvents.userDeleted).map((event) => event.properties)).toEqual([
      { userId: 'u-1' },
      { userId: 'u-2' },
    ]);
  });

  it('builds but never submits batches in a dry run', async () => {
    const { client, telemetry, delays, deleter } = setup({ dryRun: true });

    const outcome = await deleter.deleteAll(userIds(25));

    expect(client.batches).toEqual([]);
    expect(delays).toEqual([]);
    expect(outcome.value.batches.map((batch) => [batch.status, batch.operations.length])).toEqual([
      ['skipped', 20],
      ['skipped', 5],
    ]);
    expect(outcome.value).toMatchObject({ queued: 25, succeeded: 0, failed: 0, failedBatches: 0 });
    expect(telemetry.named(TelemetryEvents.userDeleted)).toEqual([]);
  });

  it('escapes account ids in the request url', async () => {
    const { client, deleter } = setup();

    await deleter.deleteAll(['user#1']);

    expect(client.batches[0][0].url).toBe('/users/user%231');
  });
});
