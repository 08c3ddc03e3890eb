/**
 * Bounded Retry Policy
 *
 * Shared by the Labfolder client (transient responses) and the importer
 * (attachment uploads). Exponential backoff capped at maxDelayMs.
 */

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt (ms) */
  initialDelayMs: number;
  /** Upper bound for any single delay (ms) */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
};

export interface RetryOptions {
  /** Return false to surface the error immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before attempt `attempt + 1`, where `attempt` starts at 1.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry?.(error, attempt) ?? true;
      if (!retryable || attempt >= attempts) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
