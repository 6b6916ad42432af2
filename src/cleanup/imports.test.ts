import { describe, it, expect, vi } from 'vitest';

const loaded = vi.hoisted(() => ({ dotenv: false, cron: false }));

vi.mock('dotenv/config', () => {
  loaded.dotenv = true;
  return {};
});
vi.mock('node-cron', () => {
  loaded.cron = true;
  return { schedule: vi.fn(), validate: vi.fn(() => true) };
});

describe('cleanup modules', () => {
  it('load without reading the environment file or the scheduler', async () => {
    await import('./orchestrator');
    await import('../directory/graph-client');

    expect(loaded).toEqual({ dotenv: false, cron: false });
  });
});
