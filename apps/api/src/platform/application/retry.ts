import { ConcurrencyConflictError } from './errors';

export type RetryOptions = Readonly<{
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}>;

export type RetryOutcome<T> =
  | { readonly success: true; readonly result: T }
  | { readonly success: false; readonly result: undefined };

const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Retries `action` on concurrency conflicts with exponential backoff.
 * Any other error is rethrown immediately. Only meant for secondary writes;
 * claim and publish must fail fast instead.
 */
export const executeWithRetry = async <T>(
  action: () => Promise<T>,
  { maxRetries = 3, initialDelayMs = 50, maxDelayMs = 1000 }: RetryOptions = {}
): Promise<RetryOutcome<T>> => {
  let waitMs = initialDelayMs;
  for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
    try {
      return { success: true, result: await action() };
    } catch (error) {
      if (!(error instanceof ConcurrencyConflictError)) {
        throw error;
      }
      if (attempt === maxRetries) {
        break;
      }
      await delay(waitMs);
      waitMs = Math.min(waitMs * 2, maxDelayMs);
    }
  }
  return { success: false, result: undefined };
};
