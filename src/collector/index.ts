/**
 * Collector Module - Public API
 *
 * Paginated enumeration, bounded worker pool and throttling-aware retries.
 */

export { ConcurrentCollector, default } from './concurrent-collector.js';
export type { CollectorConfig, CollectorStats, CollectionResult, DetailFetcher } from './concurrent-collector.js';
export { RetryPolicy, isThrottlingError, delay } from './retry-policy.js';
export type { RetryPolicyConfig, RetryContext, SleepFn } from './retry-policy.js';
export { BoundedQueue } from './bounded-queue.js';
export type { QueueResult } from './bounded-queue.js';
export { ResultAggregator } from './result-aggregator.js';
export { fromPaginator, fromTokenPages, listAll } from './listing-source.js';
export type { ListingSource, ListingPage } from './listing-source.js';
