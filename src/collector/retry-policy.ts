/**
 * RetryPolicy - bounded exponential backoff for throttled remote calls.
 *
 * Only throttling errors are retried; anything else fails the operation on
 * the spot. The policy holds no state between calls.
 */

import { CancelledError, ItemFetchError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const logger = createLogger('retry');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyConfig {
  /** Total attempts, first call included. Default: 5 */
  maxAttempts?: number;
  /** Delay unit; attempt n (zero-indexed) waits 2^n units. Default: 1000 */
  baseDelayMs?: number;
  /** Decides whether an error is a throttling signal. Default: isThrottlingError */
  isRetryable?: (error: unknown) => boolean;
  /** Sleep implementation, replaceable in tests. Default: cancellable delay */
  sleep?: SleepFn;
}

export interface RetryContext {
  /** Aborts pending backoff sleeps and prevents further attempts. */
  signal?: AbortSignal;
  /** Identifies the operation in log lines and errors. */
  label?: string;
}

/** Error names and codes AWS services use for throttling. */
const THROTTLING_CODES: ReadonlySet<string> = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'RequestThrottledException',
  'ProvisionedThroughputExceededException',
  'SlowDown',
]);

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * Recognises the "rate exceeded" family of remote errors raised by the AWS SDK.
 */
export function isThrottlingError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  for (const key of ['name', 'code', 'Code']) {
    const value = stringField(error, key);
    if (value !== undefined && THROTTLING_CODES.has(value)) return true;
  }

  const metadata: unknown = Reflect.get(error, '$metadata');
  if (typeof metadata === 'object' && metadata !== null && Reflect.get(metadata, 'httpStatusCode') === 429) {
    return true;
  }

  return stringField(error, 'message')?.includes('Rate exceeded') ?? false;
}

/** setTimeout-based delay that rejects with CancelledError when the signal aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Backoff cancelled'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Backoff cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ═══════════════════════════════════════════════════════════════
// RETRY POLICY
// ═══════════════════════════════════════════════════════════════

export class RetryPolicy {
  private readonly config: Required<RetryPolicyConfig>;

  constructor(config: RetryPolicyConfig = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 5,
      baseDelayMs: config.baseDelayMs ?? 1000,
      isRetryable: config.isRetryable ?? isThrottlingError,
      sleep: config.sleep ?? delay,
    };

    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
  }

  /**
   * Runs the operation, retrying throttled attempts with backoff.
   * @throws ItemFetchError on a non-throttling error or after the last throttled attempt
   * @throws CancelledError when the signal aborts before or between attempts
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, context: RetryContext = {}): Promise<T> {
    const { signal, label = 'operation' } = context;
    const { maxAttempts, baseDelayMs, isRetryable, sleep } = this.config;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError(`${label} cancelled`);
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError(`${label} cancelled`);
        }

        if (!isRetryable(error)) {
          throw new ItemFetchError(`${label} failed: ${errorMessage(error)}`, attempt + 1, { cause: error });
        }

        if (attempt + 1 >= maxAttempts) {
          throw new ItemFetchError(
            `${label} still throttled after ${maxAttempts} attempts: ${errorMessage(error)}`,
            maxAttempts,
            { cause: error }
          );
        }

        const waitMs = 2 ** attempt * baseDelayMs;
        logger.warn({ label, attempt: attempt + 1, waitMs }, 'Throttled, retrying');
        await sleep(waitMs, signal);
      }
    }
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }
}

export default RetryPolicy;
