/**
 * SecretSweep - Main Entry Point
 *
 * Exports all public APIs for embedding the sweep in other tools.
 */

// Registry Module
export { PatternRegistry } from './registry/pattern-registry.js';
export type {
  CompiledPattern,
  PatternCompileWarning,
  PatternRegistryOptions,
  PatternSource,
} from './registry/types.js';
export { PASSWORD_PATTERN_NAME, PASSWORD_FALLBACK_EXPRESSION, DEFAULT_EXCLUSIONS } from './registry/types.js';

// Scanner Module
export { PatternScanner, parseMatchMode, passesStrengthCheck, MATCH_MODES } from './scanner/pattern-scanner.js';
export type { MatchMode, MatchSet } from './scanner/pattern-scanner.js';
export { redact, truncateForDisplay, formatMatch, DISPLAY_LIMIT } from './scanner/redactor.js';

// Collector Module
export { ConcurrentCollector } from './collector/concurrent-collector.js';
export type { CollectorConfig, CollectorStats, CollectionResult, DetailFetcher } from './collector/concurrent-collector.js';
export { RetryPolicy, isThrottlingError, delay } from './collector/retry-policy.js';
export type { RetryPolicyConfig, RetryContext, SleepFn } from './collector/retry-policy.js';
export { BoundedQueue } from './collector/bounded-queue.js';
export { ResultAggregator } from './collector/result-aggregator.js';
export { fromPaginator, fromTokenPages, listAll } from './collector/listing-source.js';
export type { ListingSource, ListingPage } from './collector/listing-source.js';

// Sources Module
export { createSources, defineSource, createClientConfig, SOURCE_FACTORIES } from './sources/index.js';
export type {
  AwsConnection,
  AwsClientConfig,
  ResourceSourceDefinition,
  ScanItem,
  ScanSource,
  ScanTarget,
  ServiceName,
} from './sources/index.js';

// Sweep Module
export { SecretSweep } from './sweep/secret-sweep.js';
export type { SecretSweepConfig } from './sweep/secret-sweep.js';
export type { Finding, ItemFindings, SourceSummary, SweepReporter, SweepSummary } from './sweep/types.js';

// Report Module
export { ConsoleReporter } from './report/console-reporter.js';
export type { ConsoleReporterOptions } from './report/console-reporter.js';

// Config Module
export { loadConfig, ALL_SERVICES, DEFAULT_SERVICES } from './config/config.js';
export type { SweepConfig } from './config/config.js';

// Shared
export {
  SweepError,
  SweepErrorCode,
  ConfigError,
  ItemFetchError,
  EnumerationError,
  CancelledError,
} from './shared/errors.js';

// Version
export const VERSION = '0.1.0';
