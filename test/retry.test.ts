import { describe, it, expect } from "vitest";
import { RetryPolicy } from "../src/core/retry";

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe("RetryPolicy", () => {
  it("makes exactly maxRetries + 1 attempts on an always-failing operation", async () => {
    const { delays, sleep } = recordingSleep();
    const policy = new RetryPolicy({ maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 100, sleep });
    let calls = 0;

    const outcome = await policy.run(async () => {
      calls++;
      throw new Error(`boom ${calls}`);
    });

    expect(calls).toBe(4);
    expect(outcome.succeeded).toBe(false);
    expect(outcome.attempts).toBe(4);
    expect(!outcome.succeeded && outcome.error).toEqual(new Error("boom 4"));
    expect(delays).toEqual([111, 248, 485]);
  });

  it("caps the exponential part at maxDelayMs before adding jitter", () => {
    const policy = new RetryPolicy({ maxRetries: 5, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 100 });
    expect(policy.delayFor(3)).toBe(822);
    expect(policy.delayFor(4)).toBe(1059);
  });

  it("returns the first successful result", async () => {
    const { sleep } = recordingSleep();
    const policy = new RetryPolicy({ maxRetries: 3, baseDelayMs: 10, maxDelayMs: 100, sleep });
    let calls = 0;

    const outcome = await policy.run(async () => {
      calls++;
      if (calls < 3) throw new Error("transient");
      return "ok";
    });

    expect(outcome).toEqual({ succeeded: true, result: "ok", attempts: 3 });
  });

  it("stops early when shouldRetry declines", async () => {
    const { delays, sleep } = recordingSleep();
    const policy = new RetryPolicy({
      maxRetries: 5,
      baseDelayMs: 10,
      maxDelayMs: 100,
      sleep,
      shouldRetry: () => false,
    });

    const outcome = await policy.run(async () => {
      throw new Error("fatal");
    });

    expect(outcome.attempts).toBe(1);
    expect(delays).toEqual([]);
  });

  it("propagates cancellation during backoff instead of retrying", async () => {
    const policy = new RetryPolicy({ maxRetries: 3, baseDelayMs: 10_000, maxDelayMs: 10_000 });
    const controller = new AbortController();
    let calls = 0;

    const pending = policy.run(async () => {
      calls++;
      throw new Error("down");
    }, controller.signal);
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
    expect(calls).toBe(1);
  });
});
