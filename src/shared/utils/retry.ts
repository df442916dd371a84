/**
 * Retry with Exponential Backoff
 *
 * Generic retry utility for calls to external services
 * (registration site, captcha solver). The per-row captcha loop has its own
 * attempt budget; this is for transport-level retries of a single call.
 */
import { logger } from "../../monitoring/logger";

export interface RetryOptions {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  backoffFactor?: number;
  /** Upper bound for a single delay (default: 10s) */
  maxDelayMs?: number;
  /** Return false to stop retrying on this error */
  shouldRetry?: (error: Error) => boolean;
  /** Optional label for log messages */
  label?: string;
}

/**
 * Executes an async function with exponential backoff retry.
 *
 * @returns The result of fn() on success
 * @throws The last error if all attempts are exhausted or shouldRetry declines
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    maxDelayMs = 10000,
    shouldRetry = () => true,
    label = "operation",
  } = options;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= attempts || !shouldRetry(lastError)) {
        logger.error(
          { attempt, maxAttempts: attempts, error: lastError.message, label },
          `${label} failed after ${attempt} attempt(s)`
        );
        throw lastError;
      }

      const delay = computeBackoffDelay(attempt, initialDelayMs, backoffFactor, maxDelayMs);

      logger.warn(
        { attempt, maxAttempts: attempts, delay, error: lastError.message, label },
        `${label} attempt ${attempt} failed, retrying in ${delay}ms`
      );

      await sleep(delay);
    }
  }
}

/**
 * Delay before the retry that follows `attempt`, with ±20% jitter,
 * capped at maxDelayMs.
 */
export function computeBackoffDelay(
  attempt: number,
  initialDelayMs: number,
  backoffFactor: number,
  maxDelayMs: number
): number {
  const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempt - 1));
  const jitter = delay * 0.2 * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(Math.min(maxDelayMs, delay + jitter)));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
