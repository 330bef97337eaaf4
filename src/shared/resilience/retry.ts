/**
 * =============================================================================
 * RETRY - Bounded exponential backoff and interruptible sleep
 * =============================================================================
 *
 * USAGE:
 * ```typescript
 * const trip = await withRetry(() => repository.get(tripId), {
 *   maxAttempts: 3,
 *   baseDelayMs: 500,
 *   signal: controller.signal
 * });
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt; doubles each time */
  baseDelayMs: number;
  /** Upper bound for a single delay */
  maxDelayMs?: number;
  /** Stops retrying (and waiting) once aborted */
  signal?: AbortSignal;
  /** Label for log lines */
  operation?: string;
  /** Return false to rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Error raised from sleep() when the signal aborts
 */
export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Sleep that wakes early (rejecting with AbortedError) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 30000): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

/**
 * Run fn up to maxAttempts times. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, signal, operation = 'operation', shouldRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || (shouldRetry && !shouldRetry(error))) {
        break;
      }

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      logger.warn(`[Retry] ${operation} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`, {
        error: errorMessage(error)
      });
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
