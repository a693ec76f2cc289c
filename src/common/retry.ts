import { Clock } from './clock';
import { isTransportError } from '../exchanges/exchange.errors';

export interface RetryOptions {
  clock: Clock;
  attempts: number;
  /** Delay before attempt n+1 is `backoffMs * n` */
  backoffMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
}

/**
 * Runs an idempotent call up to `attempts` times. Only errors accepted by
 * `shouldRetry` (transport failures by default) are retried; anything else and
 * the last failure are rethrown as is.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransportError;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error) || options.signal?.aborted) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await options.clock.sleep(options.backoffMs * attempt, options.signal);
    }
  }
}
