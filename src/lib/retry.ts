import { isTransientError } from './errors.js';

export interface RetryOptions {
  // Total number of invocations, including the first one.
  attempts?: number;
  delayMs?: number;
  isTransient?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number) => void;
}

export interface PollSettings {
  attempts: number;
  delaySeconds: number;
}

const DEFAULT_ATTEMPTS = 3;
const DEFAULT_DELAY_MS = 5000;

/**
 * Runs `operation` until it succeeds, retrying transient failures.
 *
 * Non-transient failures and the failure of the last attempt are rethrown as-is.
 */
export async function retry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_ATTEMPTS;
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const isTransient = options.isTransient ?? isTransientError;

  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`attempts must be a positive integer, got ${attempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= attempts || !isTransient(err)) {
        throw err;
      }
      options.onRetry?.(err, attempt);
      await sleep(delayMs);
    }
  }
}

export function pollOptions(settings: PollSettings): RetryOptions {
  return { attempts: settings.attempts, delayMs: settings.delaySeconds * 1000 };
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
