/**
 * ConcurrentCollector - paginated enumeration fanned out to a bounded worker pool.
 *
 * One feeder walks the listing source page by page and pushes every ref onto
 * a bounded queue; `concurrency` workers pull refs and fetch their detail
 * through the retry policy. Item failures are logged and skipped. A listing
 * failure aborts the run and discards everything collected for that listing.
 */

import { BoundedQueue } from './bounded-queue.js';
import type { ListingSource } from './listing-source.js';
import { ResultAggregator } from './result-aggregator.js';
import { RetryPolicy } from './retry-policy.js';
import { CancelledError, EnumerationError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const logger = createLogger('collector');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Fetches the detail for one ref. Resolving to null skips the ref (for
 * instance a resource deleted between listing and fetch).
 */
export type DetailFetcher<TRef, TDetail> = (ref: TRef, signal: AbortSignal) => Promise<TDetail | null>;

export interface CollectorConfig {
  /** Worker count and queue capacity. Must be at least 1. */
  concurrency: number;
  /** Wraps every detail fetch. Default: new RetryPolicy() */
  retryPolicy?: RetryPolicy;
  /** Names the listing in logs and errors. Default: 'resources' */
  label?: string;
}

export interface CollectorStats {
  /** Pages requested from the listing source. */
  pages: number;
  /** Refs handed to the queue. */
  listed: number;
  /** Details recorded. */
  collected: number;
  /** Refs whose fetch failed after retries. */
  failed: number;
  /** Refs the fetcher resolved to null. */
  skipped: number;
}

export interface CollectionResult<TDetail> {
  details: TDetail[];
  stats: CollectorStats;
}

// ═══════════════════════════════════════════════════════════════
// CONCURRENT COLLECTOR
// ═══════════════════════════════════════════════════════════════

export class ConcurrentCollector {
  private readonly concurrency: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly label: string;

  constructor(config: CollectorConfig) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${config.concurrency}`);
    }
    this.concurrency = config.concurrency;
    this.retryPolicy = config.retryPolicy ?? new RetryPolicy();
    this.label = config.label ?? 'resources';
  }

  /**
   * Collects the detail of every listed ref.
   * @throws EnumerationError when the listing source fails
   * @throws CancelledError when the signal aborts
   */
  async collect<TRef, TDetail>(
    source: ListingSource<TRef>,
    fetchDetail: DetailFetcher<TRef, TDetail>,
    signal?: AbortSignal,
    describeRef?: (ref: TRef) => string
  ): Promise<TDetail[]> {
    const result = await this.collectWithStats(source, fetchDetail, signal, describeRef);
    return result.details;
  }

  /** Same as `collect`, also returning run statistics. */
  async collectWithStats<TRef, TDetail>(
    source: ListingSource<TRef>,
    fetchDetail: DetailFetcher<TRef, TDetail>,
    signal?: AbortSignal,
    describeRef: (ref: TRef) => string = ref => String(ref)
  ): Promise<CollectionResult<TDetail>> {
    if (signal?.aborted) {
      throw new CancelledError(`Collection of ${this.label} cancelled`);
    }

    const queue = new BoundedQueue<TRef>(this.concurrency);
    const aggregator = new ResultAggregator<TDetail>();
    const stats: CollectorStats = { pages: 0, listed: 0, collected: 0, failed: 0, skipped: 0 };
    const outcome: { enumerationFailure: { error: unknown } | null } = { enumerationFailure: null };

    // Aborted by the caller's signal or by a listing failure. Either way the
    // queue is emptied so a feeder blocked on a full queue wakes up.
    const controller = new AbortController();
    controller.signal.addEventListener('abort', () => queue.abandon(), { once: true });
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const feed = async (): Promise<void> => {
      try {
        let hasMore = true;
        while (hasMore && !controller.signal.aborted) {
          const page = await source.nextPage(controller.signal);
          stats.pages++;

          for (const ref of page.items) {
            if (controller.signal.aborted) return;
            if (!(await queue.push(ref))) return;
            stats.listed++;
          }
          hasMore = page.hasMore;
        }
      } catch (error) {
        if (controller.signal.aborted) {
          logger.debug({ label: this.label, error: errorMessage(error) }, 'Listing interrupted by cancellation');
          return;
        }
        outcome.enumerationFailure = { error };
        controller.abort();
      } finally {
        queue.close();
      }
    };

    const work = async (workerId: number): Promise<void> => {
      for (;;) {
        const next = await queue.pull();
        if (next.done || controller.signal.aborted) return;

        const ref = next.value;
        try {
          const detail = await this.retryPolicy.execute(
            () => fetchDetail(ref, controller.signal),
            { signal: controller.signal, label: `${this.label} ${describeRef(ref)}` }
          );

          if (detail === null) {
            stats.skipped++;
            continue;
          }

          aggregator.add(detail);
          stats.collected++;
        } catch (error) {
          if (controller.signal.aborted) return;
          stats.failed++;
          logger.warn({ label: this.label, ref: describeRef(ref), workerId, error: errorMessage(error) }, 'Detail fetch failed, skipping');
        }
      }
    };

    try {
      const workers = Array.from({ length: this.concurrency }, (_, index) => work(index));
      await Promise.all([feed(), ...workers]);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (outcome.enumerationFailure !== null) {
      const { error } = outcome.enumerationFailure;
      logger.error({ label: this.label, pages: stats.pages, discarded: aggregator.size, error: errorMessage(error) }, 'Listing failed');
      throw new EnumerationError(
        `Failed to list ${this.label}: ${errorMessage(error)}`,
        { label: this.label, pages: stats.pages, discarded: aggregator.size },
        { cause: error }
      );
    }

    if (signal?.aborted) {
      throw new CancelledError(`Collection of ${this.label} cancelled`);
    }

    logger.info({ label: this.label, ...stats }, 'Collection complete');
    return { details: aggregator.snapshot(), stats };
  }
}

export default ConcurrentCollector;
