import { describe, it, expect } from "vitest";
import { SlidingWindowLimiter } from "../src/core/rate-limiter";
import { FakeClock } from "./helpers";

describe("SlidingWindowLimiter", () => {
  it("denies after maxPerMinute successes and permits once the window slides", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({ maxPerMinute: 2, maxPerHour: 100, now: clock.now });

    limiter.recordOutcome(true);
    limiter.recordOutcome(true);

    const denied = limiter.tryAcquire();
    expect(denied.permitted).toBe(false);
    expect(denied.retryAfterSeconds).toBe(60);

    clock.advance(30_000);
    expect(limiter.tryAcquire().retryAfterSeconds).toBe(30);

    clock.advance(30_000);
    expect(limiter.tryAcquire()).toEqual({ permitted: true, retryAfterSeconds: 0 });
  });

  it("reports the wait of the binding hour window", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({ maxPerMinute: 5, maxPerHour: 3, now: clock.now });
    for (let i = 0; i < 3; i++) limiter.recordOutcome(true);

    clock.advance(61_000);
    const res = limiter.tryAcquire();
    expect(res.permitted).toBe(false);
    expect(res.retryAfterSeconds).toBe(3539);
  });

  it("reserves a slot per permit so concurrent callers cannot overshoot", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({ maxPerMinute: 2, maxPerHour: 100, now: clock.now });

    expect(limiter.tryAcquire().permitted).toBe(true);
    expect(limiter.tryAcquire().permitted).toBe(true);
    expect(limiter.tryAcquire().permitted).toBe(false);

    // settling the reservations does not count the calls twice
    limiter.recordOutcome(true);
    limiter.recordOutcome(true);
    expect(limiter.stats().minuteCount).toBe(2);
  });

  it("gives a failed call's slot back to the windows", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({
      maxPerMinute: 2,
      maxPerHour: 100,
      failureCooldownMs: 1_000,
      now: clock.now,
    });

    expect(limiter.tryAcquire().permitted).toBe(true);
    limiter.recordOutcome(false);
    expect(limiter.stats().minuteCount).toBe(0);

    clock.advance(1_000);
    expect(limiter.tryAcquire().permitted).toBe(true);
    limiter.recordOutcome(true);

    expect(limiter.tryAcquire()).toEqual({ permitted: true, retryAfterSeconds: 0 });
    expect(limiter.stats()).toMatchObject({ minuteCount: 2, hourCount: 2 });
  });

  it("holds a failure cooldown regardless of window capacity", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({
      maxPerMinute: 10,
      maxPerHour: 100,
      failureCooldownMs: 30_000,
      now: clock.now,
    });

    limiter.recordOutcome(false);
    expect(limiter.tryAcquire()).toEqual({ permitted: false, retryAfterSeconds: 30 });

    clock.advance(29_000);
    expect(limiter.tryAcquire()).toEqual({ permitted: false, retryAfterSeconds: 1 });

    clock.advance(1_000);
    expect(limiter.tryAcquire().permitted).toBe(true);
  });

  it("takes a caller-supplied cooldown and clears it on success", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({ maxPerMinute: 10, maxPerHour: 100, now: clock.now });

    limiter.recordOutcome(false, 90_000);
    expect(limiter.tryAcquire().retryAfterSeconds).toBe(90);
    expect(limiter.stats().denied).toBe(1);

    limiter.recordOutcome(true);
    expect(limiter.tryAcquire().permitted).toBe(true);
  });

  it("leaves the cooldown alone when a permit is abandoned", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowLimiter({ maxPerMinute: 10, maxPerHour: 100, now: clock.now });

    expect(limiter.tryAcquire().permitted).toBe(true);
    limiter.abandon();

    const stats = limiter.stats();
    expect(stats.minuteCount).toBe(1);
    expect(stats.cooldownRemainingSeconds).toBe(0);
  });
});
