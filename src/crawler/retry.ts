import { errorMessage, isTransientFetchError } from '../errors';

export const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

export type RetryPolicy = {
  /** Retries after the first attempt. */
  retries: number;
  baseMs: number;
  capMs: number;
};

export type RetryHooks = {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

export const backoffDelay = (attempt: number, policy: Pick<RetryPolicy, 'baseMs' | 'capMs'>) =>
  Math.min(policy.capMs, policy.baseMs * 2 ** (attempt - 1));

export class RetriesExhausted extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`, { cause: lastError });
    this.name = 'RetriesExhausted';
  }
}

/**
 * Runs `fn` until it resolves, retrying FetchTimeout/FetchError with capped
 * exponential backoff. Any other error is rethrown immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<{ value: T; attempts: number }> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = policy.retries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (err) {
      if (!isTransientFetchError(err)) throw err;
      if (attempt >= maxAttempts) throw new RetriesExhausted(attempt, err);
      const delayMs = backoffDelay(attempt, policy);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }
}
