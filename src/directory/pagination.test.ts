import { describe, it, expect } from 'vitest';
import { FakeDirectoryClient, accounts } from '../test-support/fakes';
import { walkPages } from './pagination';

describe('walkPages', () => {
  it('follows next links until the last page', async () => {
    const client = new FakeDirectoryClient();
    client.userPages = [accounts('a', 'b'), accounts('c'), accounts('d')];

    const seen: string[][] = [];
    for await (const page of walkPages(client, () => client.listUsers({ filter: 'f', select: ['id'] }))) {
      seen.push(page.items.map((item) => item.id));
    }

    expect(seen).toEqual([['a', 'b'], ['c'], ['d']]);
    expect(client.calls).toEqual(['listUsers', 'getNextPage:fake://users/1', 'getNextPage:fake://users/2']);
  });

  it('awaits the hook before every follow-up page only', async () => {
    const client = new FakeDirectoryClient();
    client.userPages = [accounts('a'), accounts('b'), accounts('c')];
    const hookCalls: number[] = [];

    const pages = walkPages(client, () => client.listUsers({ filter: 'f', select: ['id'] }), {
      beforeNextPage: async (pagesRead) => {
        hookCalls.push(pagesRead);
      },
    });
    for await (const page of pages) {
      expect(page.items).toHaveLength(1);
    }

    expect(hookCalls).toEqual([1, 2]);
  });

  it('does not call the hook for a single page', async () => {
    const client = new FakeDirectoryClient();
    client.userPages = [accounts('a')];
    let hookCalls = 0;

    const pages = walkPages(client, () => client.listUsers({ filter: 'f', select: ['id'] }), {
      beforeNextPage: async () => {
        hookCalls++;
      },
    });
    for await (const page of pages) {
      expect(page.nextLink).toBeNull();
    }

    expect(hookCalls).toBe(0);
  });

  it('propagates a page error after yielding earlier pages', async () => {
    const client = new FakeDirectoryClient();
    client.userPages = [accounts('a'), new Error('page 2 failed')];

    const seen: string[] = [];
    const consume = async () => {
      for await (const page of walkPages(client, () => client.listUsers({ filter: 'f', select: ['id'] }))) {
        seen.push(...page.items.map((item) => item.id));
      }
    };

    await expect(consume()).rejects.toThrow('page 2 failed');
    expect(seen).toEqual(['a']);
  });
});
