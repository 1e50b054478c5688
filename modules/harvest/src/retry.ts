import type { BackoffMode } from '../../config/src/index.js';
import type { Logger } from '../../logging/src/index.js';
import { classifyError } from './errors.js';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  backoff: BackoffMode;
  label?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(mode: BackoffMode, baseDelayMs: number, failedAttempt: number): number {
  return mode === 'linear' ? baseDelayMs * failedAttempt : baseDelayMs;
}

/**
 * Runs `fn` until it succeeds, a fatal error occurs, or the attempt budget is spent.
 * Whatever escapes is a classified {@link HarvestError}.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? 'operation';

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const classified = classifyError(err);
      if (!classified.retryable) {
        throw classified;
      }
      if (attempt >= attempts) {
        options.logger?.warn(`${label} failed after ${attempts} attempts: ${classified.message}`);
        throw classified;
      }
      const delay = backoffDelay(options.backoff, options.baseDelayMs, attempt);
      options.logger?.debug('retry', { label, attempt, kind: classified.kind, delay, message: classified.message });
      await sleep(delay);
    }
  }
}
