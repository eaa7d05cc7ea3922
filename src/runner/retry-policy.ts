import type { ConnectionConfig } from '../types/connection.js';
import { isTabrunnerError } from '../exception/errors.js';

type RetryConfig = Pick<ConnectionConfig, 'maxRetries' | 'retryDelayMs'>;

export interface WithRetryOptions {
  /** Defaults to the error kind's own retryability. */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Constant-delay retry rules shared by session reconnection and callers that
 * want to retry one flaky recipe call. Retrying is always opt-in: recipes can
 * have side effects.
 */
export const RetryPolicy = {
  /** One delay per allowed retry, each equal to `retryDelayMs`. */
  attempts(config: RetryConfig): number[] {
    const count = Math.max(0, Math.floor(config.maxRetries));
    return Array.from({ length: count }, () => config.retryDelayMs);
  },
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: WithRetryOptions = {},
): Promise<T> {
  const isRetryable = options.isRetryable ?? ((error: unknown) => isTabrunnerError(error) && error.retryable);
  const wait = options.sleep ?? sleep;
  const delays = RetryPolicy.attempts(config);

  let attempt = 0;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= delays.length || !isRetryable(error)) throw error;
      const delayMs = delays[attempt];
      attempt++;
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
