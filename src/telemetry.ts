// ---------------------------------------------------------------------------
// Telemetry sink
//
// Named counted events and operation spans. The sink is write-only from the
// job's point of view; the default implementation emits structured log lines
// that the log pipeline turns into events.
// ---------------------------------------------------------------------------

import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

export type TelemetryProperties = Record<string, string>;
export type TelemetryMeasurements = Record<string, number>;

export interface OperationSpan {
  readonly name: string;
  readonly operationId: string;
  end(success: boolean): void;
}

export interface TelemetrySink {
  trackEvent(
    name: string,
    properties?: TelemetryProperties,
    measurements?: TelemetryMeasurements,
  ): void;
  startOperation(name: string): OperationSpan;
}

export const TelemetryEvents = {
  userDeleted: 'User deleted',
  searchCompleted: 'Search completed',
  groupResolved: 'Protected group resolved',
  batchCompleted: 'Batch completed',
  runCompleted: 'Cleanup run completed',
} as const;

export class LogTelemetry implements TelemetrySink {
  constructor(
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now,
  ) {}

  trackEvent(
    name: string,
    properties: TelemetryProperties = {},
    measurements: TelemetryMeasurements = {},
  ): void {
    this.logger.info({ event: name, properties, measurements }, name);
  }

  startOperation(name: string): OperationSpan {
    const operationId = uuidv4();
    const startedAt = this.clock();
    const log = this.logger.child({ operation: name, operationId });
    log.info(`${name} started`);

    let ended = false;
    return {
      name,
      operationId,
      end: (success: boolean) => {
        if (ended) return;
        ended = true;
        log.info({ success, durationMs: this.clock() - startedAt }, `${name} finished`);
      },
    };
  }
}
