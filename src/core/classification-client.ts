import type { Verdict } from "../types/common";
import type { UpstreamClassifier } from "../upstream/types";
import { errorMessage, UpstreamError } from "../util/errors";
import { NOOP_LOGGER, type Logger } from "../util/logger";
import { sleep } from "../util/sleep";
import type { ContentCache } from "./content-cache";
import type { RateLimiterStats, SlidingWindowLimiter } from "./rate-limiter";
import { RetryPolicy, type RetryOptions, type RetryOutcome } from "./retry";

export interface ClassificationClientOptions {
  upstream: UpstreamClassifier;
  limiter: SlidingWindowLimiter;
  cache: ContentCache<Verdict>;
  retry: Omit<RetryOptions, "shouldRetry">;
  /** Denials with a shorter wait are slept out once; longer ones return unknown. */
  maxWaitSeconds?: number;
  /** Cooldown after a 429, longer than the limiter's ordinary failure cooldown. */
  rateLimitedCooldownMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export interface ClassificationStats {
  attempted: number;
  succeeded: number;
  failed: number;
  cacheHits: number;
  rateLimited: number;
  cacheSize: number;
  limiter: RateLimiterStats;
}

/**
 * Cache -> rate gate -> upstream call with retries.
 *
 * `classify` resolves to `null` when the verdict could not be determined (rate
 * limited or retries exhausted). Callers must treat that as "do not act", never
 * as clean. Only violations are cached so a changed upstream policy is picked up
 * for texts that used to pass.
 */
export class ClassificationClient {
  private readonly upstream: UpstreamClassifier;
  private readonly limiter: SlidingWindowLimiter;
  private readonly cache: ContentCache<Verdict>;
  private readonly retry: RetryPolicy;
  private readonly maxWaitSeconds: number;
  private readonly rateLimitedCooldownMs: number;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  private attempted = 0;
  private succeeded = 0;
  private failed = 0;
  private cacheHits = 0;
  private rateLimited = 0;

  constructor(opts: ClassificationClientOptions) {
    this.upstream = opts.upstream;
    this.limiter = opts.limiter;
    this.cache = opts.cache;
    this.sleepFn = opts.sleep ?? sleep;
    this.retry = new RetryPolicy({
      ...opts.retry,
      sleep: opts.retry.sleep ?? this.sleepFn,
      // a 429 goes straight to the limiter cooldown instead of hammering the service
      shouldRetry: (err) => !(err instanceof UpstreamError && err.rateLimited),
    });
    this.maxWaitSeconds = opts.maxWaitSeconds ?? 5;
    this.rateLimitedCooldownMs = opts.rateLimitedCooldownMs ?? 60_000;
    this.logger = opts.logger ?? NOOP_LOGGER;
  }

  async classify(text: string, signal?: AbortSignal): Promise<Verdict | null> {
    if (!text.trim()) return { isViolation: false, matchedTerms: [] };

    const cached = this.cache.get(text);
    if (cached) {
      this.cacheHits++;
      return copyVerdict(cached);
    }

    if (!(await this.passGate(signal))) {
      this.rateLimited++;
      return null;
    }

    this.attempted++;
    let outcome: RetryOutcome<Verdict>;
    try {
      outcome = await this.retry.run((_attempt, sig) => this.upstream.classify(text, sig), signal);
    } catch (err) {
      this.limiter.abandon();
      throw err;
    }

    if (outcome.succeeded) {
      this.succeeded++;
      this.limiter.recordOutcome(true);
      if (outcome.result.isViolation) this.cache.put(text, copyVerdict(outcome.result));
      return outcome.result;
    }

    this.failed++;
    const rateLimited = outcome.error instanceof UpstreamError && outcome.error.rateLimited;
    this.limiter.recordOutcome(false, rateLimited ? this.rateLimitedCooldownMs : undefined);
    this.logger.warn("classification_failed", {
      attempts: outcome.attempts,
      rateLimited,
      error: errorMessage(outcome.error),
    });
    return null;
  }

  /** Periodic maintenance hook; returns the number of cache entries dropped. */
  evictCache(): number {
    return this.cache.evict();
  }

  stats(): ClassificationStats {
    return {
      attempted: this.attempted,
      succeeded: this.succeeded,
      failed: this.failed,
      cacheHits: this.cacheHits,
      rateLimited: this.rateLimited,
      cacheSize: this.cache.size,
      limiter: this.limiter.stats(),
    };
  }

  private async passGate(signal?: AbortSignal): Promise<boolean> {
    const first = this.limiter.tryAcquire();
    if (first.permitted) return true;
    if (first.retryAfterSeconds > this.maxWaitSeconds) {
      this.logger.debug("classification_rate_limited", { retryAfterSeconds: first.retryAfterSeconds });
      return false;
    }

    await this.sleepFn(Math.ceil(first.retryAfterSeconds * 1000), signal);
    return this.limiter.tryAcquire().permitted;
  }
}

// callers own the arrays they get back; the cached entry stays untouched
function copyVerdict(verdict: Verdict): Verdict {
  return { isViolation: verdict.isViolation, matchedTerms: [...verdict.matchedTerms] };
}
