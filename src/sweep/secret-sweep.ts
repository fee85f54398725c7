/**
 * SecretSweep - runs every selected source through the collector and scans
 * what comes back.
 *
 * Sources run one after another. A source whose listing fails is reported
 * and skipped; cancellation stops the whole run.
 *
 * Events:
 * - 'source:start' (label)
 * - 'source:complete' (SourceSummary)
 * - 'source:error' (SourceSummary, Error)
 */

import { EventEmitter } from 'events';
import type { RetryPolicy } from '../collector/retry-policy.js';
import { PatternScanner, type MatchMode, type MatchSet } from '../scanner/pattern-scanner.js';
import type { PatternRegistry } from '../registry/pattern-registry.js';
import { CancelledError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { ScanItem, ScanSource, ScanTarget } from '../sources/types.js';
import type { Finding, ItemFindings, SourceSummary, SweepReporter, SweepSummary } from './types.js';

const logger = createLogger('sweep');

export interface SecretSweepConfig {
  registry: PatternRegistry;
  matchMode: MatchMode;
  /** Concurrency level of every collection. */
  threads: number;
  retryPolicy?: RetryPolicy;
  reporter?: SweepReporter;
}

function countMatches(matches: MatchSet): number {
  return Object.values(matches).reduce((total, values) => total + values.length, 0);
}

export class SecretSweep extends EventEmitter {
  private readonly scanner: PatternScanner;
  private readonly config: SecretSweepConfig;

  constructor(config: SecretSweepConfig) {
    super();
    this.config = config;
    this.scanner = new PatternScanner(config.registry);
  }

  /** Scans one target according to its kind. */
  scanTarget(target: ScanTarget): MatchSet {
    const mode = this.config.matchMode;
    switch (target.kind) {
      case 'text':
        return this.scanner.match(target.text, mode);
      case 'variables':
        return this.scanner.matchKeyValues(target.values, mode);
      case 'parameters':
        return this.scanner.matchParameters(target.values, mode);
    }
  }

  /** Scans every target of an item, keeping the targets that matched. */
  scanItem(item: ScanItem): ItemFindings {
    const findings: Finding[] = [];
    for (const target of item.targets) {
      const matches = this.scanTarget(target);
      if (Object.keys(matches).length > 0) {
        findings.push({ target, matches });
      }
    }
    return { item, findings };
  }

  /**
   * Runs the sources in order.
   * @throws CancelledError when the signal aborts
   */
  async run(sources: readonly ScanSource[], signal?: AbortSignal): Promise<SweepSummary> {
    const summaries: SourceSummary[] = [];

    for (const source of sources) {
      if (signal?.aborted) {
        throw new CancelledError('Sweep cancelled');
      }
      summaries.push(await this.runSource(source, signal));
    }

    return {
      sources: summaries,
      matchCount: summaries.reduce((total, s) => total + s.matchCount, 0),
      failedSources: summaries.filter(s => s.status === 'failed').length,
    };
  }

  private async runSource(source: ScanSource, signal: AbortSignal | undefined): Promise<SourceSummary> {
    const startTime = Date.now();
    const { reporter } = this.config;

    this.emit('source:start', source.label);
    reporter?.sourceStart(source.label);
    logger.info({ service: source.service, label: source.label }, 'Collecting');

    try {
      const { items, stats } = await source.collect({
        concurrency: this.config.threads,
        retryPolicy: this.config.retryPolicy,
        signal,
      });

      let itemsWithFindings = 0;
      let matchCount = 0;
      for (const item of items) {
        const result = this.scanItem(item);
        if (result.findings.length === 0) continue;

        itemsWithFindings++;
        matchCount += result.findings.reduce((total, f) => total + countMatches(f.matches), 0);
        reporter?.item(result);
      }

      const summary: SourceSummary = {
        service: source.service,
        label: source.label,
        status: 'complete',
        listed: stats.listed,
        collected: stats.collected,
        failed: stats.failed,
        itemsWithFindings,
        matchCount,
        durationMs: Date.now() - startTime,
      };

      reporter?.sourceComplete(summary);
      this.emit('source:complete', summary);
      logger.info({ ...summary }, 'Source scanned');
      return summary;
    } catch (error) {
      if (error instanceof CancelledError) throw error;

      const summary: SourceSummary = {
        service: source.service,
        label: source.label,
        status: 'failed',
        listed: 0,
        collected: 0,
        failed: 0,
        itemsWithFindings: 0,
        matchCount: 0,
        durationMs: Date.now() - startTime,
        error: errorMessage(error),
      };

      reporter?.sourceFailed(summary);
      this.emit('source:error', summary, error instanceof Error ? error : new Error(errorMessage(error)));
      logger.error({ service: source.service, label: source.label, error: summary.error }, 'Source failed');
      return summary;
    }
  }
}

export default SecretSweep;
