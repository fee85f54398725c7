/**
 * PatternScanner - applies the pattern registry to harvested text.
 *
 * Two matching modes:
 * - all-submatches: every non-overlapping occurrence anywhere in the text
 * - line: every line in which the pattern matches, reported whole
 *
 * Patterns flagged for the strength check are always evaluated per line.
 */

import type { PatternRegistry } from '../registry/pattern-registry.js';
import type { CompiledPattern } from '../registry/types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type MatchMode = 'all-submatches' | 'line';

/** Pattern name to matched strings, in discovery order. Empty entries are omitted. */
export type MatchSet = Record<string, string[]>;

export const MATCH_MODES: readonly MatchMode[] = ['all-submatches', 'line'];

/** Accepted spellings, including the names used by older pattern files. */
const MATCH_MODE_ALIASES: Readonly<Record<string, MatchMode>> = {
  'all-submatches': 'all-submatches',
  allsubmatches: 'all-submatches',
  findallstringsubmatch: 'all-submatches',
  line: 'line',
  matchstring: 'line',
};

/** Characters of which a strong password must contain at least one. */
export const PASSWORD_SPECIAL_CHARACTERS = '!@#$%^&*';

const LINE_BREAK = /\r?\n|\r/;

/**
 * Resolves a configured match mode name.
 * @returns the mode, or null for an unknown value
 */
export function parseMatchMode(value: string): MatchMode | null {
  return MATCH_MODE_ALIASES[value.trim().toLowerCase()] ?? null;
}

/**
 * Password strength check: the base expression must match and the candidate
 * must contain an upper-case letter, a lower-case letter, a digit and one of
 * the special characters.
 */
export function passesStrengthCheck(pattern: CompiledPattern, candidate: string): boolean {
  if (!pattern.regex.test(candidate)) return false;

  let hasUpper = false;
  let hasLower = false;
  let hasDigit = false;
  let hasSpecial = false;

  for (const char of candidate) {
    if (char >= 'A' && char <= 'Z') hasUpper = true;
    else if (char >= 'a' && char <= 'z') hasLower = true;
    else if (char >= '0' && char <= '9') hasDigit = true;
    else if (PASSWORD_SPECIAL_CHARACTERS.includes(char)) hasSpecial = true;
  }

  return hasUpper && hasLower && hasDigit && hasSpecial;
}

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

// ═══════════════════════════════════════════════════════════════
// PATTERN SCANNER
// ═══════════════════════════════════════════════════════════════

export class PatternScanner {
  private readonly registry: PatternRegistry;

  constructor(registry: PatternRegistry) {
    this.registry = registry;
  }

  /**
   * Scans text and returns the surviving candidates per pattern.
   * Empty text yields an empty set.
   */
  match(text: string, mode: MatchMode): MatchSet {
    const matches: MatchSet = {};
    if (text.length === 0) return matches;

    let lines: string[] | null = null;

    for (const pattern of this.registry.entries()) {
      let candidates: string[];

      if (pattern.strengthCheck) {
        lines ??= splitLines(text);
        candidates = lines.filter(line => passesStrengthCheck(pattern, line));
      } else if (mode === 'all-submatches') {
        candidates = findAll(pattern, text);
      } else {
        lines ??= splitLines(text);
        candidates = lines.filter(line => pattern.regex.test(line));
      }

      const surviving = applyExclusions(pattern, candidates);
      if (surviving.length > 0) {
        matches[pattern.name] = surviving;
      }
    }

    return matches;
  }

  /**
   * Scans a key/value map such as environment variables.
   *
   * A key that matches reports its value; a value that matches reports the
   * matched strings. Both are labelled with the key and pattern name.
   */
  matchKeyValues(values: Record<string, string>, mode: MatchMode): MatchSet {
    const matches: MatchSet = {};

    for (const [key, value] of Object.entries(values)) {
      for (const patternName of Object.keys(this.match(key, mode))) {
        matches[`Key matched in variable: ${key} (Pattern: ${patternName})`] = [value];
      }

      for (const [patternName, matched] of Object.entries(this.match(value, mode))) {
        matches[`Value of key: ${key} (Pattern: ${patternName})`] = matched;
      }
    }

    return matches;
  }

  /** Scans job parameters, reporting each matching entry as `key: value` under the pattern name. */
  matchParameters(params: Record<string, string>, mode: MatchMode): MatchSet {
    const matches: MatchSet = {};

    for (const [key, value] of Object.entries(params)) {
      for (const patternName of Object.keys(this.match(value, mode))) {
        (matches[patternName] ??= []).push(`${key}: ${value}`);
      }
    }

    return matches;
  }

  /** Number of compiled patterns in use. */
  getLoadedPatternCount(): number {
    return this.registry.size;
  }
}

// ════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════

/** Every non-overlapping, non-empty occurrence of the pattern. */
function findAll(pattern: CompiledPattern, text: string): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(pattern.globalRegex)) {
    if (match[0].length > 0) {
      found.push(match[0]);
    }
  }
  return found;
}

function applyExclusions(pattern: CompiledPattern, candidates: string[]): string[] {
  if (pattern.exclusions.length === 0) return candidates;
  return candidates.filter(candidate => !pattern.exclusions.some(word => candidate.includes(word)));
}

export default PatternScanner;
