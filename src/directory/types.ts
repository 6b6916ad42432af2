// ---------------------------------------------------------------------------
// Directory capability consumed by the cleanup workflow
// ---------------------------------------------------------------------------

/** The $batch endpoint accepts at most 20 requests. */
export const MAX_BATCH_SIZE = 20;
/** Practical maximum of $top for group members. */
export const MAX_GROUP_PAGE_SIZE = 999;

/** A user or group member as returned by a field-limited query. */
export interface DirectoryObject {
  id: string;
  displayName: string | null;
}

export interface DirectoryPage {
  items: DirectoryObject[];
  /** Opaque cursor for the next page, or null on the last page. */
  nextLink: string | null;
}

export interface ListUsersQuery {
  filter: string;
  select: string[];
}

export interface ListMembersQuery {
  top: number;
  select: string[];
}

export interface BatchOperation {
  /** Caller-chosen correlation key, unique within the batch. */
  id: string;
  method: 'DELETE';
  url: string;
}

export interface BatchOperationResult {
  id: string;
  status: number;
  body?: unknown;
}

export interface DirectoryClient {
  listUsers(query: ListUsersQuery): Promise<DirectoryPage>;
  listGroupMembers(groupId: string, query: ListMembersQuery): Promise<DirectoryPage>;
  getNextPage(nextLink: string): Promise<DirectoryPage>;
  /** Submits up to 20 operations as one request. */
  submitBatch(operations: BatchOperation[]): Promise<BatchOperationResult[]>;
}
