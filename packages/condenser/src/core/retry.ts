import type { Logger } from '../utils/logger.js';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** One retry after the first failure. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  baseDelayMs: 500,
  maxDelayMs: 5000,
};

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Network errors, timeouts, 5xx and 429 are transient; other 4xx are not.
 */
export function isRetriable(error: unknown): boolean {
  const statusCode = statusCodeOf(error);
  if (statusCode === undefined) return true;
  if (statusCode === 429) return true;
  return statusCode >= 500;
}

export function computeDelay(
  attempt: number,
  config: RetryConfig,
  jitter?: () => number
): number {
  const random = jitter ?? Math.random;
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jittered = exponential * (0.5 + random() * 0.5);
  return Math.min(jittered, config.maxDelayMs);
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Run `fn` until it succeeds or `maxAttempts` is reached. A non-retriable
 * failure is rethrown as is; exhausting the attempts throws
 * `RetryExhaustedError` wrapping the last failure.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig>,
  logger: Logger,
  sleepFn?: (ms: number) => Promise<void>,
  jitterFn?: () => number
): Promise<RetryResult<T>> {
  const resolved: RetryConfig = {
    maxAttempts: config.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
  };
  const sleep = sleepFn ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));

  let lastError = new Error('No attempts made');

  for (let attempt = 0; attempt < resolved.maxAttempts; attempt++) {
    try {
      const value = await fn();
      return { value, attempts: attempt + 1 };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetriable(error)) {
        logger.debug('Non-retriable error, skipping retry', {
          attempt: attempt + 1,
          statusCode: statusCodeOf(error),
        });
        throw lastError;
      }

      if (attempt < resolved.maxAttempts - 1) {
        const delay = computeDelay(attempt, resolved, jitterFn);
        logger.debug('Retrying after failure', {
          attempt: attempt + 1,
          maxAttempts: resolved.maxAttempts,
          delayMs: Math.round(delay),
          error: lastError.message,
        });
        await sleep(delay);
      }
    }
  }

  throw new RetryExhaustedError(resolved.maxAttempts, lastError);
}
