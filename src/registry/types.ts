/**
 * Registry Module Types
 */

/** Reserved pattern name whose matches go through the password strength check. */
export const PASSWORD_PATTERN_NAME = 'Password Pattern';

/** Substituted when the reserved password pattern fails to compile. */
export const PASSWORD_FALLBACK_EXPRESSION = '^[A-Za-z\\d]{8,}$';

/** Candidates containing any of these substrings are dropped for the named pattern. */
export const DEFAULT_EXCLUSIONS: Readonly<Record<string, readonly string[]>> = {
  AWS_Client: ['iam:PassRole', 'S3Key'],
};

/** Raw pattern configuration: pattern name to expression. */
export type PatternSource = Record<string, string>;

export interface CompiledPattern {
  /** Unique pattern name. */
  readonly name: string;
  /** Expression that was actually compiled (the fallback, when substituted). */
  readonly expression: string;
  /** Non-global regex, safe for `test()` from any caller. */
  readonly regex: RegExp;
  /** Global twin of `regex`, only ever used through `matchAll` (which clones it). */
  readonly globalRegex: RegExp;
  /** Disqualifying substrings. */
  readonly exclusions: readonly string[];
  /** Whether candidates must also pass the password strength check. */
  readonly strengthCheck: boolean;
  /** Whether the configured expression was replaced by the fallback. */
  readonly fallback: boolean;
}

/** Recorded when a configured expression could not be compiled. */
export interface PatternCompileWarning {
  name: string;
  expression: string;
  message: string;
  /** True when the fallback expression replaced the entry instead of dropping it. */
  substituted: boolean;
}

export interface PatternRegistryOptions {
  /** Extra exclusion substrings, merged with the defaults per pattern name. */
  exclusions?: Record<string, string[]>;
}
