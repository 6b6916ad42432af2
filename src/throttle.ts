import { setTimeout as delay } from 'timers/promises';
import type { CleanupConfig } from './config';

// ---------------------------------------------------------------------------
// Cooperative throttling
//
// The directory rate-limits list and batch calls per tenant. Pauses between
// pages and between batches are part of the job's contract with it.
// ---------------------------------------------------------------------------

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  if (ms > 0) await delay(ms);
};

export interface ThrottlePolicy {
  pageDelayMs: number;
  batchDelayMs: number;
  batchSize: number;
}

export function throttleFromConfig(cleanup: CleanupConfig): ThrottlePolicy {
  return {
    pageDelayMs: cleanup.pageDelayMs,
    batchDelayMs: cleanup.batchDelayMs,
    batchSize: cleanup.batchSize,
  };
}
