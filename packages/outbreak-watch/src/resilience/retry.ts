/**
 * Retry with Exponential Backoff
 *
 * Retries failed snapshot fetches with exponential backoff and jitter.
 *
 * DESIGN:
 * - Exponential backoff: delay = initialDelay * (multiplier ^ (attempt - 1))
 * - Jitter: randomness prevents synchronized retries
 * - Retry predicates: only transient transport failures are retried
 * - Sleep is injected so the scheduler's clock drives the backoff
 */

import { FetchError, FetchTimeoutError } from '../core/errors.js';

export type RetryableErrorType =
  | 'network_timeout'
  | 'network_error'
  | 'rate_limit'
  | 'service_unavailable'
  | 'gateway_timeout'
  | 'server_error';

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** 0 disables jitter */
  readonly jitterFactor: number;
  readonly retryableErrors: readonly RetryableErrorType[];
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly delayMs: number;
  readonly error: Error;
  readonly retryable: boolean;
}

export type RetrySleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const ALL_RETRYABLE_ERRORS: readonly RetryableErrorType[] = [
  'network_timeout',
  'network_error',
  'rate_limit',
  'service_unavailable',
  'gateway_timeout',
  'server_error',
];

/**
 * Retry exhausted error (thrown after max attempts or on a non-retryable error)
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Retry executor with exponential backoff
 *
 * @example
 * ```typescript
 * const retry = new RetryExecutor({
 *   maxAttempts: 3,
 *   initialDelayMs: 2000,
 *   maxDelayMs: 60000,
 *   backoffMultiplier: 2,
 *   jitterFactor: 0.1,
 *   retryableErrors: ALL_RETRYABLE_ERRORS,
 * });
 *
 * const bytes = await retry.execute(() => fetcher.fetch(signal), signal);
 * ```
 */
export class RetryExecutor {
  constructor(
    private readonly config: RetryConfig,
    private readonly sleep: RetrySleep = defaultSleep
  ) {}

  /**
   * Execute function with retry logic
   *
   * @throws RetryExhaustedError wrapping the last failure
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const attempts: RetryAttempt[] = [];
    const maxAttempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));
        const errorType = classifyError(lastError);
        const retryable = errorType !== null && this.config.retryableErrors.includes(errorType);
        const delay = this.calculateDelay(attempt);

        attempts.push({ attemptNumber: attempt, delayMs: delay, error: lastError, retryable });

        if (!retryable || attempt >= maxAttempts || signal?.aborted) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        await this.sleep(delay, signal);
      }
    }
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }
}

/**
 * Classify a fetch failure into a retry type; null = not retryable
 */
export function classifyError(error: Error): RetryableErrorType | null {
  if (error instanceof FetchTimeoutError) {
    return 'network_timeout';
  }
  if (!(error instanceof FetchError)) {
    return null;
  }

  const status = error.statusCode;
  if (status === undefined) return 'network_error';
  if (status === 408) return 'network_timeout';
  if (status === 429) return 'rate_limit';
  if (status === 503) return 'service_unavailable';
  if (status === 504) return 'gateway_timeout';
  if (status >= 500) return 'server_error';
  return null;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create retry executor with fetch defaults
 */
export function createRetryExecutor(
  overrides?: Partial<RetryConfig>,
  sleep?: RetrySleep
): RetryExecutor {
  const config: RetryConfig = {
    maxAttempts: 3,
    initialDelayMs: 2_000,
    maxDelayMs: 60_000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
    retryableErrors: ALL_RETRYABLE_ERRORS,
    ...overrides,
  };

  return new RetryExecutor(config, sleep);
}
