// ---------------------------------------------------------------------------
// In-process stand-ins used by the test suites
// ---------------------------------------------------------------------------

import { GraphError } from '@microsoft/microsoft-graph-client';
import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from '../config';
import type {
  BatchOperation,
  BatchOperationResult,
  DirectoryClient,
  DirectoryObject,
  DirectoryPage,
  ListMembersQuery,
  ListUsersQuery,
} from '../directory/types';
import type {
  OperationSpan,
  TelemetryMeasurements,
  TelemetryProperties,
  TelemetrySink,
} from '../telemetry';
import type { Sleep } from '../throttle';

export const silentLogger: Logger = pino({ level: 'silent' });

export function accounts(...ids: string[]): DirectoryObject[] {
  return ids.map((id) => ({ id, displayName: `User ${id}` }));
}

/** `count` accounts named `${prefix}-1` … `${prefix}-${count}`. */
export function numberedAccounts(prefix: string, count: number): DirectoryObject[] {
  return accounts(...Array.from({ length: count }, (_, i) => `${prefix}-${i + 1}`));
}

/** A page of items, or an error thrown when that page is requested. */
export type PageScript = Array<DirectoryObject[] | Error>;

const FAKE_LINK = /^fake:\/\/(.+)\/(\d+)$/;

export class FakeDirectoryClient implements DirectoryClient {
  userPages: PageScript = [[]];
  readonly groupPages = new Map<string, PageScript>();
  /** Zero-based indexes of batches whose submission throws. */
  readonly failingBatches = new Set<number>();
  batchResults?: (operations: BatchOperation[], index: number) => BatchOperationResult[];

  readonly calls: string[] = [];
  readonly userQueries: ListUsersQuery[] = [];
  readonly memberQueries: Array<{ groupId: string; query: ListMembersQuery }> = [];
  readonly batches: BatchOperation[][] = [];

  async listUsers(query: ListUsersQuery): Promise<DirectoryPage> {
    this.calls.push('listUsers');
    this.userQueries.push(query);
    return this.page('users', 0);
  }

  async listGroupMembers(groupId: string, query: ListMembersQuery): Promise<DirectoryPage> {
    this.calls.push(`listGroupMembers:${groupId}`);
    this.memberQueries.push({ groupId, query });
    return this.page(`groups/${groupId}`, 0);
  }

  async getNextPage(nextLink: string): Promise<DirectoryPage> {
    this.calls.push(`getNextPage:${nextLink}`);
    const match = FAKE_LINK.exec(nextLink);
    if (!match) throw new Error(`Unexpected next link ${nextLink}`);
    return this.page(match[1], Number(match[2]));
  }

  async submitBatch(operations: BatchOperation[]): Promise<BatchOperationResult[]> {
    const index = this.batches.length;
    this.calls.push(`submitBatch:${index}`);
    this.batches.push([...operations]);

    if (this.failingBatches.has(index)) {
      throw new GraphError(503, 'Service unavailable');
    }
    if (this.batchResults) {
      return this.batchResults(operations, index);
    }
    return operations.map((operation) => ({ id: operation.id, status: 204 }));
  }

  private page(key: string, index: number): DirectoryPage {
    const script = key === 'users' ? this.userPages : this.groupPages.get(key.slice('groups/'.length));
    const entry = script?.[index] ?? [];
    if (entry instanceof Error) throw entry;

    const hasNext = script !== undefined && index + 1 < script.length;
    return { items: entry, nextLink: hasNext ? `fake://${key}/${index + 1}` : null };
  }
}

// ---------------------------------------------------------------------------

export interface RecordedEvent {
  name: string;
  properties?: TelemetryProperties;
  measurements?: TelemetryMeasurements;
}

export class RecordingTelemetry implements TelemetrySink {
  readonly events: RecordedEvent[] = [];
  readonly spans: Array<{ name: string; success: boolean | null }> = [];

  trackEvent(
    name: string,
    properties?: TelemetryProperties,
    measurements?: TelemetryMeasurements,
  ): void {
    this.events.push({ name, properties, measurements });
  }

  startOperation(name: string): OperationSpan {
    const span: { name: string; success: boolean | null } = { name, success: null };
    this.spans.push(span);
    return {
      name,
      operationId: `op-${this.spans.length}`,
      end: (success) => {
        span.success = success;
      },
    };
  }

  named(name: string): RecordedEvent[] {
    return this.events.filter((event) => event.name === name);
  }
}

// ---------------------------------------------------------------------------

export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export function testConfig(overrides: Partial<AppConfig['cleanup']> = {}): AppConfig {
  return {
    identity: {
      tenantId: 'tenant-test',
      clientId: 'client-test',
      certificateThumbprint: 'AB12',
      certificateSource: 'env',
      certificatePath: null,
      certificatePem: 'placeholder',
    },
    cleanup: {
      adminGroupId: null,
      exclusiveDemosGroupId: null,
      inactivityDays: 30,
      pageDelayMs: 3000,
      batchDelayMs: 3000,
      batchSize: 20,
      groupPageSize: 999,
      dryRun: false,
      ...overrides,
    },
    schedule: { expression: '30 9 * * *', timezone: 'UTC', runOnStartup: false },
    server: { port: 0, apiKey: null },
    databaseFile: ':memory:',
    logLevel: 'silent',
  };
}
