export interface RateLimiterOptions {
  maxPerMinute: number;
  maxPerHour: number;
  /** Cooldown applied by `recordOutcome(false)` unless the caller gives its own. */
  failureCooldownMs?: number;
  now?: () => number;
}

export interface AcquireResult {
  permitted: boolean;
  retryAfterSeconds: number;
}

export interface RateLimiterStats {
  minuteCount: number;
  hourCount: number;
  cooldownRemainingSeconds: number;
  denied: number;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;
const DEFAULT_FAILURE_COOLDOWN_MS = 30_000;

/**
 * Two rolling windows (60 s, 3600 s) of upstream calls plus a failure cooldown.
 *
 * The windows hold accepted calls. A permit books its slot immediately so that
 * concurrent callers cannot all slip through before any of them reports back;
 * `recordOutcome` settles the oldest open reservation, keeping the slot on
 * success and giving it back on failure. Successes reported without a prior
 * permit are appended directly.
 * Every method is synchronous, so each call is a single critical section on the
 * event loop. The limiter never waits; callers decide what to do with a denial.
 */
export class SlidingWindowLimiter {
  private readonly maxPerMinute: number;
  private readonly maxPerHour: number;
  private readonly failureCooldownMs: number;
  private readonly now: () => number;

  private minute: number[] = [];
  private hour: number[] = [];
  private readonly reserved: number[] = [];
  private cooldownUntil: number | null = null;
  private deniedCount = 0;

  constructor(opts: RateLimiterOptions) {
    this.maxPerMinute = opts.maxPerMinute;
    this.maxPerHour = opts.maxPerHour;
    this.failureCooldownMs = opts.failureCooldownMs ?? DEFAULT_FAILURE_COOLDOWN_MS;
    this.now = opts.now ?? Date.now;
  }

  tryAcquire(): AcquireResult {
    const now = this.now();

    if (this.cooldownUntil !== null) {
      if (now < this.cooldownUntil) {
        this.deniedCount++;
        return { permitted: false, retryAfterSeconds: (this.cooldownUntil - now) / 1000 };
      }
      this.cooldownUntil = null;
    }

    this.prune(now);

    let waitMs = 0;
    if (this.minute.length >= this.maxPerMinute) {
      waitMs = Math.max(waitMs, this.minute[0] + MINUTE_MS - now);
    }
    if (this.hour.length >= this.maxPerHour) {
      waitMs = Math.max(waitMs, this.hour[0] + HOUR_MS - now);
    }
    if (waitMs > 0) {
      this.deniedCount++;
      return { permitted: false, retryAfterSeconds: waitMs / 1000 };
    }

    this.minute.push(now);
    this.hour.push(now);
    this.reserved.push(now);
    return { permitted: true, retryAfterSeconds: 0 };
  }

  /**
   * Settle one call. Success clears any cooldown; failure starts one
   * (`cooldownMs` overrides the configured length, e.g. after a 429).
   */
  recordOutcome(success: boolean, cooldownMs?: number): void {
    const now = this.now();

    const booked = this.reserved.shift();
    if (booked === undefined) {
      if (success) {
        this.minute.push(now);
        this.hour.push(now);
      }
    } else if (!success) {
      removeOne(this.minute, booked);
      removeOne(this.hour, booked);
    }

    if (success) {
      this.cooldownUntil = null;
    } else {
      this.cooldownUntil = now + (cooldownMs ?? this.failureCooldownMs);
    }
  }

  /** Settle a permit whose call was cancelled; its slot stays counted, the cooldown is untouched. */
  abandon(): void {
    this.reserved.shift();
  }

  stats(): RateLimiterStats {
    const now = this.now();
    this.prune(now);
    const remaining = this.cooldownUntil === null ? 0 : Math.max(0, this.cooldownUntil - now);
    return {
      minuteCount: this.minute.length,
      hourCount: this.hour.length,
      cooldownRemainingSeconds: remaining / 1000,
      denied: this.deniedCount,
    };
  }

  private prune(now: number): void {
    while (this.minute.length > 0 && this.minute[0] <= now - MINUTE_MS) this.minute.shift();
    while (this.hour.length > 0 && this.hour[0] <= now - HOUR_MS) this.hour.shift();
  }
}

function removeOne(window: number[], timestamp: number): void {
  const idx = window.indexOf(timestamp);
  if (idx >= 0) window.splice(idx, 1);
}
