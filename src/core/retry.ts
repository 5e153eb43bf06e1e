import { abortError, isAbortError } from "../util/errors";
import { sleep } from "../util/sleep";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound (exclusive) of the per-attempt jitter. */
  jitterMs?: number;
  /** Return false to stop retrying after this error. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type RetryOutcome<T> =
  | { succeeded: true; result: T; attempts: number }
  | { succeeded: false; error: unknown; attempts: number };

/**
 * Bounded exponential backoff. Failures are reported through the outcome, not
 * thrown; only cancellation escapes as an AbortError.
 */
export class RetryPolicy {
  private readonly opts: RetryOptions;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(opts: RetryOptions) {
    this.opts = opts;
    this.sleepFn = opts.sleep ?? sleep;
  }

  /** Delay before the retry that follows failed attempt number `attempt` (0-based). */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitterMs = 100 } = this.opts;
    const backoff = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
    const jitter = jitterMs > 0 ? (attempt * 37 + 11) % jitterMs : 0;
    return backoff + jitter;
  }

  async run<T>(
    operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<RetryOutcome<T>> {
    const total = this.opts.maxRetries + 1;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < total; attempt++) {
      if (signal?.aborted) throw abortError();
      try {
        const result = await operation(attempt, signal);
        return { succeeded: true, result, attempts: attempt + 1 };
      } catch (err) {
        if (isAbortError(err)) throw err;
        lastError = err;
        const last = attempt === total - 1;
        if (last || (this.opts.shouldRetry && !this.opts.shouldRetry(err, attempt))) {
          return { succeeded: false, error: err, attempts: attempt + 1 };
        }
      }
      await this.sleepFn(this.delayFor(attempt), signal);
    }

    return { succeeded: false, error: lastError, attempts: total };
  }
}

