/**
 * ConcurrentCollector Test Suite
 */

import { describe, it, expect, vi } from 'vitest';
import { ConcurrentCollector } from '../collector/concurrent-collector.js';
import { fromPaginator, fromTokenPages, listAll, type ListingPage, type ListingSource } from '../collector/listing-source.js';
import { RetryPolicy } from '../collector/retry-policy.js';
import { CancelledError, EnumerationError } from '../shared/errors.js';

const noSleep = new RetryPolicy({ sleep: async () => undefined });

/** Listing source over fixed pages; `failAt` makes that (1-based) page call reject. */
function pagedSource<T>(pages: T[][], failAt?: number): ListingSource<T> & { readonly calls: number } {
  let calls = 0;
  return {
    get calls(): number {
      return calls;
    },
    async nextPage(): Promise<ListingPage<T>> {
      calls++;
      if (calls === failAt) {
        throw new Error(`page ${failAt} unavailable`);
      }
      return { items: pages[calls - 1] ?? [], hasMore: calls < pages.length };
    },
  };
}

const PAGES = [[1, 2, 3], [4, 5], [6, 7, 8, 9, 10]];
const ALL_IDS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

const sorted = (values: number[]): number[] => [...values].sort((a, b) => a - b);

describe('ConcurrentCollector', () => {
  it('should reject a concurrency below one', () => {
    expect(() => new ConcurrentCollector({ concurrency: 0 })).toThrow(RangeError);
  });

  it.each([1, 2, 3, 5, 10])('should collect every item across pages with %i workers', async (concurrency) => {
    const collector = new ConcurrentCollector({ concurrency, retryPolicy: noSleep });

    const details = await collector.collect(pagedSource(PAGES), async id => id * 10);

    expect(sorted(details)).toEqual(ALL_IDS.map(id => id * 10));
  });

  it('should skip failing items and keep the rest', async () => {
    const collector = new ConcurrentCollector({ concurrency: 3, retryPolicy: noSleep });

    const { details, stats } = await collector.collectWithStats(pagedSource(PAGES), async id => {
      if (id % 2 === 0) throw new Error(`item ${id} gone`);
      return id;
    });

    expect(sorted(details)).toEqual([1, 3, 5, 7, 9]);
    expect(stats).toEqual({ pages: 3, listed: 10, collected: 5, failed: 5, skipped: 0 });
  });

  it('should fail with EnumerationError and no results when a later page fails', async () => {
    const collector = new ConcurrentCollector({ concurrency: 2, retryPolicy: noSleep, label: 'widgets' });

    const result = collector.collect(pagedSource(PAGES, 2), async id => id);

    await expect(result).rejects.toBeInstanceOf(EnumerationError);
    await expect(result).rejects.toThrow('Failed to list widgets: page 2 unavailable');
  });

  it('should fail with EnumerationError when the first page fails', async () => {
    const collector = new ConcurrentCollector({ concurrency: 2, retryPolicy: noSleep });
    const fetchDetail = vi.fn(async (id: number) => id);

    await expect(collector.collect(pagedSource(PAGES, 1), fetchDetail)).rejects.toBeInstanceOf(EnumerationError);
    expect(fetchDetail).not.toHaveBeenCalled();
  });

  it('should never run more fetches than workers', async () => {
    const collector = new ConcurrentCollector({ concurrency: 3, retryPolicy: noSleep });
    let active = 0;
    let peak = 0;

    await collector.collect(pagedSource(PAGES), async id => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
      return id;
    });

    expect(peak).toBe(3);
  });

  it('should fetch duplicate refs once per listing', async () => {
    const collector = new ConcurrentCollector({ concurrency: 2, retryPolicy: noSleep });

    const details = await collector.collect(pagedSource([[1, 1], [2]]), async id => id);

    expect(sorted(details)).toEqual([1, 1, 2]);
  });

  it('should count null details as skipped', async () => {
    const collector = new ConcurrentCollector({ concurrency: 2, retryPolicy: noSleep });

    const { details, stats } = await collector.collectWithStats(pagedSource([[1, 2, 3]]), async id => (id === 2 ? null : id));

    expect(sorted(details)).toEqual([1, 3]);
    expect(stats).toMatchObject({ listed: 3, collected: 2, skipped: 1, failed: 0 });
  });

  it('should retry throttled fetches', async () => {
    const sleep = vi.fn(async () => undefined);
    const collector = new ConcurrentCollector({ concurrency: 2, retryPolicy: new RetryPolicy({ sleep }) });
    const attempts = new Map<number, number>();

    const details = await collector.collect(pagedSource([[1, 2, 3]]), async id => {
      const attempt = (attempts.get(id) ?? 0) + 1;
      attempts.set(id, attempt);
      if (attempt === 1) throw Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });
      return id;
    });

    expect(sorted(details)).toEqual([1, 2, 3]);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('should return nothing for an empty listing', async () => {
    const collector = new ConcurrentCollector({ concurrency: 4, retryPolicy: noSleep });

    const { details, stats } = await collector.collectWithStats(pagedSource<number>([[]]), async id => id);

    expect(details).toEqual([]);
    expect(stats).toEqual({ pages: 1, listed: 0, collected: 0, failed: 0, skipped: 0 });
  });

  it('should reject with CancelledError when the signal is already aborted', async () => {
    const collector = new ConcurrentCollector({ concurrency: 2, retryPolicy: noSleep });
    const controller = new AbortController();
    controller.abort();
    const source = pagedSource(PAGES);

    await expect(collector.collect(source, async id => id, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(source.calls).toBe(0);
  });

  it('should stop and reject with CancelledError when aborted mid-run', async () => {
    const collector = new ConcurrentCollector({ concurrency: 1, retryPolicy: noSleep });
    const controller = new AbortController();
    const fetched: number[] = [];

    const result = collector.collect(pagedSource(PAGES), async id => {
      fetched.push(id);
      if (id === 2) controller.abort();
      return id;
    }, controller.signal);

    await expect(result).rejects.toBeInstanceOf(CancelledError);
    expect(fetched).toEqual([1, 2]);
  });
});

describe('listing sources', () => {
  it('should adapt an async iterable of pages', async () => {
    async function* pages(): AsyncGenerator<{ Names?: string[] }> {
      yield { Names: ['a', 'b'] };
      yield {};
      yield { Names: ['c'] };
    }

    const source = fromPaginator(pages(), page => page.Names ?? []);

    expect(await listAll(source)).toEqual(['a', 'b', 'c']);
  });

  it('should not request another page once the signal is aborted', async () => {
    let requested = 0;
    async function* pages(): AsyncGenerator<string[]> {
      requested++;
      yield ['a'];
      requested++;
      yield ['b'];
    }
    const source = fromPaginator(pages(), page => page);
    const controller = new AbortController();

    expect(await source.nextPage(controller.signal)).toEqual({ items: ['a'], hasMore: true });
    controller.abort();

    await expect(source.nextPage(controller.signal)).rejects.toThrow();
    expect(requested).toBe(1);
  });

  it('should follow next tokens until they run out', async () => {
    const tokens: Array<string | undefined> = [];
    const source = fromTokenPages<string>(async token => {
      tokens.push(token);
      if (token === undefined) return { items: ['x'], nextToken: 't1' };
      if (token === 't1') return { items: ['y'], nextToken: '' };
      return { items: ['unexpected'] };
    });

    expect(await listAll(source)).toEqual(['x', 'y']);
    expect(tokens).toEqual([undefined, 't1']);
  });
});
