/**
 * Resource source contracts.
 *
 * A source pairs a listing of refs with a per-ref detail fetch and knows
 * which text fields of the detail are worth scanning.
 */

import type { CollectorStats } from '../collector/concurrent-collector.js';
import type { ListingSource } from '../collector/listing-source.js';
import type { RetryPolicy } from '../collector/retry-policy.js';

export type ServiceName = 'ec2' | 'lambda' | 'cloudformation' | 'codebuild' | 'glue' | 'sagemaker' | 'emr';

/** Extra line printed above a target's findings (version, step name, script path). */
export interface DetailLine {
  name: string;
  value: string;
}

/** A piece of a resource handed to the scanner. */
export type ScanTarget =
  | { kind: 'text'; section: string; text: string; detail?: DetailLine }
  /** Environment-style map: keys and values are both scanned. */
  | { kind: 'variables'; section: string; values: Record<string, string>; detail?: DetailLine }
  /** Argument map: values are scanned and reported as `key: value`. */
  | { kind: 'parameters'; section: string; values: Record<string, string>; detail?: DetailLine };

/** One reportable resource and its scan targets. */
export interface ScanItem {
  /** Heading, e.g. 'Instance ID'. */
  title: string;
  /** Resource identifier shown after the heading. */
  resource: string;
  targets: ScanTarget[];
}

/** Typed definition of one resource type. */
export interface ResourceSourceDefinition<TRef, TDetail> {
  service: ServiceName;
  label: string;
  list(): ListingSource<TRef>;
  fetch(ref: TRef, signal: AbortSignal): Promise<TDetail | null>;
  describe(ref: TRef): string;
  extract(detail: TDetail): ScanItem[];
}

export interface SourceRunOptions {
  concurrency: number;
  retryPolicy?: RetryPolicy;
  signal?: AbortSignal;
}

export interface SourceCollection {
  items: ScanItem[];
  stats: CollectorStats;
}

/** Type-erased source, so sources of different ref/detail types share one list. */
export interface ScanSource {
  readonly service: ServiceName;
  readonly label: string;
  collect(options: SourceRunOptions): Promise<SourceCollection>;
}
