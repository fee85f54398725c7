/**
 * Sweep Module Types
 */

import type { MatchSet } from '../scanner/pattern-scanner.js';
import type { ScanItem, ScanTarget, ServiceName } from '../sources/types.js';

/** Matches found in one scan target. Targets without matches are not reported. */
export interface Finding {
  target: ScanTarget;
  matches: MatchSet;
}

export interface ItemFindings {
  item: ScanItem;
  findings: Finding[];
}

export interface SourceSummary {
  service: ServiceName;
  label: string;
  status: 'complete' | 'failed';
  /** Refs handed to the workers. */
  listed: number;
  /** Details fetched and scanned. */
  collected: number;
  /** Refs whose detail could not be fetched. */
  failed: number;
  itemsWithFindings: number;
  /** Total matched strings across all items. */
  matchCount: number;
  durationMs: number;
  error?: string;
}

export interface SweepSummary {
  sources: SourceSummary[];
  matchCount: number;
  /** Sources whose listing failed. */
  failedSources: number;
}

/** Receives progress and findings as the sweep runs. */
export interface SweepReporter {
  sourceStart(label: string): void;
  item(findings: ItemFindings): void;
  sourceComplete(summary: SourceSummary): void;
  sourceFailed(summary: SourceSummary): void;
}
