import { getLogger } from './logger.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function randomBetween(min: number, max: number): number {
  return min + Math.random() * (max - min);
}

export interface RetryOptions {
  /** Total attempts including the first call. */
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Context merged into every retry log line. */
  context?: Record<string, unknown>;
  sleepFn?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY: Required<Omit<RetryOptions, 'context' | 'sleepFn'>> = {
  attempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 8_000,
};

/**
 * Delay before retry number `attempt` (1-based): base, 2×base, 4×base … capped.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run `fn` until it resolves or attempts run out; the last error is rethrown.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_RETRY.attempts;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
  const wait = options.sleepFn ?? sleep;
  const logger = getLogger();

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt < attempts) {
        const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
        logger.warn({ ...options.context, err, attempt, attempts, delayMs }, 'Attempt failed, backing off');
        await wait(delayMs);
      } else {
        logger.error({ ...options.context, err, attempts }, `Failed after ${attempts} attempts`);
      }
    }
  }

  throw lastError;
}
