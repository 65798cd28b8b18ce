/**
 * Bounded Retry
 *
 * Fixed-backoff retry around a probe. Shared by the readiness gate, the image
 * decode loop and the filer.
 */

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryOptions<T> {
  attempts: number;
  delayMs: number;
  probe: (attempt: number) => Promise<T>;
  /** Called after a failed attempt that will be retried */
  onRetry?: (attempt: number, error: unknown) => void;
  /** Return false to give up at once on this error */
  shouldRetry?: (error: unknown) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `probe` until it resolves or `attempts` is exhausted.
 * Never rejects; the last error is returned on exhaustion.
 */
export async function retry<T>(options: RetryOptions<T>): Promise<RetryResult<T>> {
  const { attempts, delayMs, probe, onRetry, shouldRetry } = options;

  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`attempts must be a positive integer, got ${attempts}`);
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await probe(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (shouldRetry && !shouldRetry(error)) {
        return { ok: false, error, attempts: attempt };
      }
      lastError = error;
      if (attempt < attempts) {
        onRetry?.(attempt, error);
        await sleep(delayMs);
      }
    }
  }

  return { ok: false, error: lastError, attempts };
}
