/**
 * PatternRegistry - loads and compiles the named pattern set.
 *
 * Built once at startup and never mutated afterwards, so a single instance
 * is shared by every scanner without locking.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigError, SweepErrorCode, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import {
  DEFAULT_EXCLUSIONS,
  PASSWORD_FALLBACK_EXPRESSION,
  PASSWORD_PATTERN_NAME,
  type CompiledPattern,
  type PatternCompileWarning,
  type PatternRegistryOptions,
  type PatternSource,
} from './types.js';

const logger = createLogger('patterns');

/** Inline case-insensitive prefix some pattern files carry; JavaScript only takes it as a flag. */
const INLINE_IGNORE_CASE = '(?i)';

/**
 * Immutable set of compiled patterns keyed by name.
 */
export class PatternRegistry {
  private readonly patterns: ReadonlyMap<string, CompiledPattern>;
  private readonly compileWarnings: readonly PatternCompileWarning[];

  private constructor(patterns: Map<string, CompiledPattern>, warnings: PatternCompileWarning[]) {
    this.patterns = patterns;
    this.compileWarnings = Object.freeze(warnings);
  }

  /**
   * Loads a registry from a JSON file path or an in-memory mapping.
   * @throws ConfigError when the file cannot be read or is not a flat
   *   object of string expressions
   */
  static load(source: string | PatternSource, options: PatternRegistryOptions = {}): PatternRegistry {
    const record = typeof source === 'string' ? readPatternFile(source) : validateSource(source, 'inline');
    return PatternRegistry.compile(record, options);
  }

  /** Compiles an already validated mapping. Invalid expressions become warnings. */
  static compile(record: PatternSource, options: PatternRegistryOptions = {}): PatternRegistry {
    const exclusions = mergeExclusions(options.exclusions);
    const compiled = new Map<string, CompiledPattern>();
    const warnings: PatternCompileWarning[] = [];

    for (const [name, expression] of Object.entries(record)) {
      const strengthCheck = name === PASSWORD_PATTERN_NAME;
      const patternExclusions = exclusions[name] ?? [];

      try {
        compiled.set(name, buildPattern(name, expression, patternExclusions, strengthCheck, false));
      } catch (error) {
        const message = errorMessage(error);

        if (strengthCheck) {
          warnings.push({ name, expression, message, substituted: true });
          logger.warn({ name, error: message }, 'Using fallback expression for password pattern');
          compiled.set(name, buildPattern(name, PASSWORD_FALLBACK_EXPRESSION, patternExclusions, true, true));
          continue;
        }

        warnings.push({ name, expression, message, substituted: false });
        logger.warn({ name, expression, error: message, code: SweepErrorCode.PATTERN_COMPILE }, 'Invalid regex pattern dropped');
      }
    }

    logger.debug({ loaded: compiled.size, dropped: warnings.filter(w => !w.substituted).length }, 'Patterns compiled');
    return new PatternRegistry(compiled, warnings);
  }

  /** Returns the compiled entry for a name. */
  get(name: string): CompiledPattern | undefined {
    return this.patterns.get(name);
  }

  has(name: string): boolean {
    return this.patterns.has(name);
  }

  /** Pattern names in configuration order. */
  names(): string[] {
    return Array.from(this.patterns.keys());
  }

  /** Compiled entries in configuration order. */
  entries(): CompiledPattern[] {
    return Array.from(this.patterns.values());
  }

  get size(): number {
    return this.patterns.size;
  }

  /** Warnings recorded while compiling. */
  get warnings(): readonly PatternCompileWarning[] {
    return this.compileWarnings;
  }

  /**
   * One-line count of dropped and substituted patterns.
   * @returns null when every pattern compiled
   */
  warningSummary(): string | null {
    if (this.compileWarnings.length === 0) return null;

    const dropped = this.compileWarnings.filter(w => !w.substituted).map(w => w.name);
    const parts: string[] = [];
    if (dropped.length > 0) {
      parts.push(`${dropped.length} invalid ${dropped.length === 1 ? 'pattern' : 'patterns'} dropped (${dropped.join(', ')})`);
    }
    if (dropped.length < this.compileWarnings.length) {
      parts.push(`${PASSWORD_PATTERN_NAME} replaced by the fallback expression`);
    }
    return parts.join('; ');
  }
}

// ════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════

function readPatternFile(filePath: string): PatternSource {
  const absolutePath = resolve(filePath);
  let raw: string;
  try {
    raw = readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read pattern file: ${absolutePath}`, { path: absolutePath }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Pattern file is not valid JSON: ${absolutePath}`, { path: absolutePath }, { cause: error });
  }

  return validateSource(parsed, absolutePath);
}

function validateSource(value: unknown, origin: string): PatternSource {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError('Pattern source must be a JSON object of name to expression', { origin });
  }

  const record: PatternSource = {};
  for (const [name, expression] of Object.entries(value)) {
    if (name.trim().length === 0) {
      throw new ConfigError('Pattern names must be non-empty', { origin });
    }
    if (typeof expression !== 'string') {
      throw new ConfigError(`Pattern "${name}" must map to a string expression`, { origin, name });
    }
    record[name] = expression;
  }
  return record;
}

function buildPattern(
  name: string,
  expression: string,
  exclusions: readonly string[],
  strengthCheck: boolean,
  fallback: boolean
): CompiledPattern {
  let source = expression;
  let flags = '';
  if (source.startsWith(INLINE_IGNORE_CASE)) {
    source = source.slice(INLINE_IGNORE_CASE.length);
    flags = 'i';
  }

  const regex = new RegExp(source, flags);
  return Object.freeze({
    name,
    expression,
    regex,
    globalRegex: new RegExp(source, `${flags}g`),
    exclusions: Object.freeze([...exclusions]),
    strengthCheck,
    fallback,
  });
}

function mergeExclusions(extra: Record<string, string[]> | undefined): Record<string, readonly string[]> {
  const merged: Record<string, readonly string[]> = { ...DEFAULT_EXCLUSIONS };
  if (!extra) return merged;

  for (const [name, words] of Object.entries(extra)) {
    merged[name] = [...(merged[name] ?? []), ...words];
  }
  return merged;
}

export default PatternRegistry;
