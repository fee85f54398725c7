/**
 * Scanner Module - Public API
 *
 * Detects sensitive data in harvested text and formats matches for display.
 */

export {
  PatternScanner,
  default,
  parseMatchMode,
  passesStrengthCheck,
  splitLines,
  MATCH_MODES,
  PASSWORD_SPECIAL_CHARACTERS,
} from './pattern-scanner.js';
export type { MatchMode, MatchSet } from './pattern-scanner.js';
export { redact, truncateForDisplay, formatMatch, DISPLAY_LIMIT } from './redactor.js';
