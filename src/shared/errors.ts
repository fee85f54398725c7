/**
 * Error taxonomy shared by every SecretSweep module.
 */

export enum SweepErrorCode {
  CONFIG_ERROR = 'SWEEP_CONFIG_ERROR',
  PATTERN_COMPILE = 'SWEEP_PATTERN_COMPILE',
  ITEM_FETCH_ERROR = 'SWEEP_ITEM_FETCH_ERROR',
  ENUMERATION_ERROR = 'SWEEP_ENUMERATION_ERROR',
  CANCELLED = 'SWEEP_CANCELLED',
  INTERNAL_ERROR = 'SWEEP_INTERNAL_ERROR',
}

/** Base error class for all SecretSweep operations. */
export class SweepError extends Error {
  public readonly code: SweepErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: SweepErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SweepError';
    this.code = code;
    this.details = details;
  }
}

/** Pattern source unreadable or unparseable, or an invalid option value. */
export class ConfigError extends SweepError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(SweepErrorCode.CONFIG_ERROR, message, details, options);
    this.name = 'ConfigError';
  }
}

/** One resource's detail could not be retrieved. Never aborts a collection. */
export class ItemFetchError extends SweepError {
  /** Number of attempts made before giving up. */
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(SweepErrorCode.ITEM_FETCH_ERROR, message, { attempts }, options);
    this.name = 'ItemFetchError';
    this.attempts = attempts;
  }
}

/** The listing source itself failed; no further refs can be discovered. */
export class EnumerationError extends SweepError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(SweepErrorCode.ENUMERATION_ERROR, message, details, options);
    this.name = 'EnumerationError';
  }
}

export class CancelledError extends SweepError {
  constructor(message = 'Operation cancelled') {
    super(SweepErrorCode.CANCELLED, message);
    this.name = 'CancelledError';
  }
}

/** Normalises an unknown thrown value to a message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
