/**
 * Sweep Module - Public API
 */

export { SecretSweep, default } from './secret-sweep.js';
export type { SecretSweepConfig } from './secret-sweep.js';
export type {
  Finding,
  ItemFindings,
  SourceSummary,
  SweepReporter,
  SweepSummary,
} from './types.js';
