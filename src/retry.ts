/**
 * Bounded retry with a fixed backoff between attempts
 */

import { toAppError } from './errors.js';
import { sleep } from './utils.js';

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;

  /** Delay between attempts in milliseconds */
  backoffMs: number;
}

export interface RetryOptions {
  /** Operation name for logging */
  name?: string;

  /** Replaces the real delay (tests) */
  wait?: (ms: number) => Promise<void>;
}

/**
 * Execute a function until it resolves or the policy's attempts run out.
 * The last error is rethrown as an AppError.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const name = options.name ?? 'operation';
  const wait = options.wait ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 0;

  while (true) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      const appError = toAppError(error);

      if (attempt >= maxAttempts) {
        console.warn(`    ${name} failed after ${attempt} attempt${attempt === 1 ? '' : 's'}: ${appError.message}`);
        throw appError;
      }

      console.warn(`    ${name} attempt ${attempt}/${maxAttempts} failed: ${appError.message}`);
      await wait(policy.backoffMs);
    }
  }
}
