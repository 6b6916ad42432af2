// ---------------------------------------------------------------------------
// Microsoft Graph implementation of DirectoryClient
//
// Responses are validated before they reach the workflow so that a changed
// or truncated payload fails the current call instead of yielding undefined
// IDs further down.
// ---------------------------------------------------------------------------

import { Client } from '@microsoft/microsoft-graph-client';
import { TokenCredentialAuthenticationProvider } from '@microsoft/microsoft-graph-client/authProviders/azureTokenCredentials';
import type { TokenCredential } from '@azure/identity';
import { z } from 'zod';
import { DirectoryResponseError } from '../errors';
import {
  MAX_BATCH_SIZE,
  type BatchOperation,
  type BatchOperationResult,
  type DirectoryClient,
  type DirectoryPage,
  type ListMembersQuery,
  type ListUsersQuery,
} from './types';

export const GRAPH_SCOPES = ['https://graph.microsoft.com/.default'];

const directoryObjectSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().nullish(),
});

const pageSchema = z.object({
  value: z.array(directoryObjectSchema),
  '@odata.nextLink': z.string().min(1).optional(),
});

const batchResponseSchema = z.object({
  responses: z.array(
    z.object({
      id: z.string(),
      status: z.number().int(),
      body: z.unknown().optional(),
    }),
  ),
});

function parsePage(body: unknown, endpoint: string): DirectoryPage {
  const parsed = pageSchema.safeParse(body);
  if (!parsed.success) {
    throw new DirectoryResponseError(
      `Unexpected list response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
      endpoint,
    );
  }
  return {
    items: parsed.data.value.map((item) => ({
      id: item.id,
      displayName: item.displayName ?? null,
    })),
    nextLink: parsed.data['@odata.nextLink'] ?? null,
  };
}

export class GraphDirectoryClient implements DirectoryClient {
  constructor(private readonly client: Client) {}

  static fromCredential(credential: TokenCredential): GraphDirectoryClient {
    const authProvider = new TokenCredentialAuthenticationProvider(credential, {
      scopes: GRAPH_SCOPES,
    });
    return new GraphDirectoryClient(Client.initWithMiddleware({ authProvider }));
  }

  async listUsers({ filter, select }: ListUsersQuery): Promise<DirectoryPage> {
    const body: unknown = await this.client.api('/users').filter(filter).select(select).get();
    return parsePage(body, '/users');
  }

  async listGroupMembers(groupId: string, { top, select }: ListMembersQuery): Promise<DirectoryPage> {
    const endpoint = `/groups/${encodeURIComponent(groupId)}/members`;
    const body: unknown = await this.client.api(endpoint).top(top).select(select).get();
    return parsePage(body, endpoint);
  }

  async getNextPage(nextLink: string): Promise<DirectoryPage> {
    const body: unknown = await this.client.api(nextLink).get();
    return parsePage(body, nextLink);
  }

  async submitBatch(operations: BatchOperation[]): Promise<BatchOperationResult[]> {
    if (operations.length > MAX_BATCH_SIZE) {
      throw new RangeError(
        `A batch holds at most ${MAX_BATCH_SIZE} operations, got ${operations.length}`,
      );
    }

    const body: unknown = await this.client.api('/$batch').post({ requests: operations });
    const parsed = batchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DirectoryResponseError('Unexpected $batch response payload', '/$batch');
    }

    return parsed.data.responses.map((response) => ({
      id: response.id,
      status: response.status,
      body: response.body,
    }));
  }
}
