// ---------------------------------------------------------------------------
// Dormant account scan
// ---------------------------------------------------------------------------

import type { Logger } from 'pino';
import { walkPages } from '../directory/pagination';
import type { DirectoryClient } from '../directory/types';
import { describeDirectoryError } from '../graph-errors';
import { TelemetryEvents, type TelemetrySink } from '../telemetry';
import type { Sleep } from '../throttle';
import type { CleanupWarning, Outcome, ProtectedAccountSet, ScanResult } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DORMANT_USER_SELECT = ['id', 'displayName'];

/** `now` minus `inactivityDays`, as `YYYY-MM-DDTHH:mm:ssZ`. */
export function formatCutoff(now: Date, inactivityDays: number): string {
  const cutoff = new Date(now.getTime() - inactivityDays * DAY_MS);
  return cutoff.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function dormancyFilter(cutoff: string): string {
  return `signInActivity/lastSignInDateTime le ${cutoff}`;
}

export interface ScannerOptions {
  inactivityDays: number;
  pageDelayMs: number;
  sleep: Sleep;
  now?: () => Date;
}

export class DormantAccountScanner {
  constructor(
    private readonly client: DirectoryClient,
    private readonly logger: Logger,
    private readonly telemetry: TelemetrySink,
    private readonly options: ScannerOptions,
  ) {}

  /**
   * Walks every account whose last sign-in is at or before the cutoff and
   * splits them into deletion candidates and protected skips. A paging error
   * ends the walk; what was read so far is still returned.
   */
  async scan(protectedIds: ProtectedAccountSet): Promise<Outcome<ScanResult>> {
    this.logger.info('Search for all dormant accounts in the directory...');

    const now = this.options.now ? this.options.now() : new Date();
    const cutoff = formatCutoff(now, this.options.inactivityDays);
    const candidates: string[] = [];
    const warnings: CleanupWarning[] = [];
    let skippedCount = 0;
    let pagesRead = 0;
    let complete = true;

    const pages = walkPages(
      this.client,
      () => this.client.listUsers({ filter: dormancyFilter(cutoff), select: DORMANT_USER_SELECT }),
      {
        beforeNextPage: async () => {
          this.logger.info(
            `${candidates.length} users will be deleted. ${skippedCount} users will be skipped`,
          );
          this.logger.info('Waiting and reading next page of users...');
          await this.options.sleep(this.options.pageDelayMs);
        },
      },
    );

    try {
      for await (const page of pages) {
        pagesRead++;
        for (const user of page.items) {
          if (protectedIds.has(user.id)) {
            skippedCount++;
          } else {
            candidates.push(user.id);
          }
        }
      }
    } catch (err) {
      complete = false;
      const { status, code, detail } = describeDirectoryError(err);
      this.logger.error({ err, status, code, pagesRead }, `Dormant account search stopped early: ${detail}`);
      warnings.push({ stage: 'scan-paging', message: detail, context: { pagesRead } });
    }

    this.logger.info(
      { cutoff, pagesRead, complete },
      `The search for dormant accounts has been completed. ${candidates.length} users will be deleted. ${skippedCount} users will be skipped`,
    );
    this.telemetry.trackEvent(TelemetryEvents.searchCompleted, undefined, {
      delete: candidates.length,
      skip: skippedCount,
    });

    return {
      value: { cutoff, candidates, skippedCount, pagesRead, complete },
      warnings,
    };
  }
}
