/**
 * Cursor pagination over directory list results.
 *
 * The first page comes from the caller's query; every following page is
 * fetched through the `nextLink` cursor of the page before it. Errors from
 * any page propagate to the consumer of the iterator, which keeps whatever
 * it already read.
 */

import type { DirectoryClient, DirectoryPage } from './types';

export interface PageWalkOptions {
  /** Awaited before each follow-up page request, never before the first. */
  beforeNextPage?: (pagesRead: number) => Promise<void>;
}

export async function* walkPages(
  client: DirectoryClient,
  firstPage: () => Promise<DirectoryPage>,
  options: PageWalkOptions = {},
): AsyncGenerator<DirectoryPage, void, undefined> {
  let page = await firstPage();
  let pagesRead = 1;
  yield page;

  while (page.nextLink) {
    if (options.beforeNextPage) {
      await options.beforeNextPage(pagesRead);
    }
    page = await client.getNextPage(page.nextLink);
    pagesRead++;
    yield page;
  }
}
