import type { Logger } from 'pino';
import { walkPages } from '../directory/pagination';
import { MAX_GROUP_PAGE_SIZE, type DirectoryClient } from '../directory/types';
import { describeDirectoryError } from '../graph-errors';
import { TelemetryEvents, type TelemetrySink } from '../telemetry';
import type { CleanupWarning, Outcome, ProtectedAccountSet } from './types';

export interface ExclusionSetBuilderOptions {
  pageSize: number;
}

/**
 * Resolves the members of the safe-list groups into one protected set.
 *
 * A group contributes its members only once its whole membership has been
 * read; a group that fails part-way contributes nothing.
 */
export class ExclusionSetBuilder {
  constructor(
    private readonly client: DirectoryClient,
    private readonly logger: Logger,
    private readonly telemetry: TelemetrySink,
    private readonly options: ExclusionSetBuilderOptions = { pageSize: MAX_GROUP_PAGE_SIZE },
  ) {}

  async build(
    groupIds: ReadonlyArray<string | null | undefined>,
  ): Promise<Outcome<ProtectedAccountSet>> {
    const protectedIds = new Set<string>();
    const warnings: CleanupWarning[] = [];

    for (const rawGroupId of groupIds) {
      const groupId = rawGroupId?.trim();
      if (!groupId) continue;

      let members: Set<string>;
      try {
        members = await this.fetchMembers(groupId);
      } catch (err) {
        const { status, code, detail } = describeDirectoryError(err);
        this.logger.error({ err, groupId, status, code }, `Error getting group members: ${detail}`);
        warnings.push({ stage: 'group-resolution', message: detail, context: { groupId } });
        continue;
      }

      let added = 0;
      for (const id of members) {
        if (protectedIds.has(id)) continue;
        protectedIds.add(id);
        added++;
      }

      this.logger.info(
        { groupId, members: members.size, added },
        `${added} protected accounts added from group ${groupId}`,
      );
      this.telemetry.trackEvent(TelemetryEvents.groupResolved, { groupId }, { added });
    }

    return { value: protectedIds, warnings };
  }

  private async fetchMembers(groupId: string): Promise<Set<string>> {
    const members = new Set<string>();
    const pages = walkPages(this.client, () =>
      this.client.listGroupMembers(groupId, { top: this.options.pageSize, select: ['id'] }),
    );

    for await (const page of pages) {
      for (const member of page.items) {
        members.add(member.id);
      }
    }
    return members;
  }
}
