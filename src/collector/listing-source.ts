/**
 * Listing sources: paginated enumerators of resource references.
 */

export interface ListingPage<TRef> {
  items: TRef[];
  hasMore: boolean;
}

/** Called repeatedly until `hasMore` is false or it rejects. */
export interface ListingSource<TRef> {
  nextPage(signal?: AbortSignal): Promise<ListingPage<TRef>>;
}

/**
 * Adapts an async iterable of pages (an AWS SDK v3 paginator) to a listing
 * source. The iterator is only consulted once per call, so the final call
 * returns an empty page with `hasMore: false`. An aborted signal stops the
 * walk before the next page is requested.
 */
export function fromPaginator<TPage, TRef>(
  pages: AsyncIterable<TPage>,
  extract: (page: TPage) => TRef[]
): ListingSource<TRef> {
  const iterator = pages[Symbol.asyncIterator]();

  return {
    async nextPage(signal?: AbortSignal): Promise<ListingPage<TRef>> {
      signal?.throwIfAborted();
      const next = await iterator.next();
      if (next.done === true) {
        return { items: [], hasMore: false };
      }
      return { items: extract(next.value), hasMore: true };
    },
  };
}

/**
 * Builds a listing source from a token-based list call, for APIs the SDK
 * ships no paginator for.
 */
export function fromTokenPages<TRef>(
  fetchPage: (token: string | undefined, signal?: AbortSignal) => Promise<{ items: TRef[]; nextToken?: string | undefined }>
): ListingSource<TRef> {
  let token: string | undefined;

  return {
    async nextPage(signal?: AbortSignal): Promise<ListingPage<TRef>> {
      const page = await fetchPage(token, signal);
      token = page.nextToken;
      return { items: page.items, hasMore: token !== undefined && token.length > 0 };
    },
  };
}

/** Drains a listing source into an array. */
export async function listAll<TRef>(source: ListingSource<TRef>, signal?: AbortSignal): Promise<TRef[]> {
  const items: TRef[] = [];
  let hasMore = true;
  while (hasMore) {
    const page = await source.nextPage(signal);
    items.push(...page.items);
    hasMore = page.hasMore;
  }
  return items;
}
