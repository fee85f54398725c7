/**
 * Registry Module - Public API
 *
 * Compiled pattern definitions with their exclusion and fallback rules.
 */

export { PatternRegistry, default } from './pattern-registry.js';
export type {
  CompiledPattern,
  PatternCompileWarning,
  PatternRegistryOptions,
  PatternSource,
} from './types.js';
export {
  PASSWORD_PATTERN_NAME,
  PASSWORD_FALLBACK_EXPRESSION,
  DEFAULT_EXCLUSIONS,
} from './types.js';
