export {
  loadConfig,
  parseServices,
  parseThreads,
  ALL_SERVICES,
  DEFAULT_SERVICES,
  DEFAULT_PATTERNS_PATH,
  DEFAULT_REGION,
  DEFAULT_THREADS,
  DEFAULT_MATCH_MODE,
  USAGE,
} from './config.js';
export type { SweepConfig } from './config.js';
