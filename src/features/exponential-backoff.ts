import { sleep } from "../utils";

export type BackoffOptions = {
  baseMs?: number;
  maximumMs?: number;
  ratio?: number;
};

const DEFAULT_BASE_MS = 500;
const DEFAULT_MAXIMUM_MS = 8_000;

export const calculateBackoff = (
  attempt: number,
  { baseMs = DEFAULT_BASE_MS, maximumMs = DEFAULT_MAXIMUM_MS, ratio = 2 }: BackoffOptions = {}
): number => {
  const timeout = baseMs * ratio ** (attempt - 1);

  return timeout > maximumMs
    ? maximumMs
    : timeout;
};

export type RetryOptions = BackoffOptions & {
  retries: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
};

/**
 * Runs `task` once, then up to `retries` more times while `shouldRetry` accepts
 * the error. Waits `calculateBackoff(attempt)` before each retry. An aborted
 * signal stops further retries and rethrows the last error.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  { retries, shouldRetry = () => true, onRetry, signal, ...backoff }: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt > retries || !shouldRetry(err) || signal?.aborted) throw err;
      const delay = calculateBackoff(attempt, backoff);
      onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }
}
