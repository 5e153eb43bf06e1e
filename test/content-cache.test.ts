import { describe, it, expect } from "vitest";
import { ContentCache } from "../src/core/content-cache";
import { FakeClock } from "./helpers";

const verdict = (word: string) => ({ isViolation: true, matchedTerms: [word] });

describe("ContentCache", () => {
  it("treats texts differing only in case or surrounding whitespace as one entry", () => {
    const cache = new ContentCache<ReturnType<typeof verdict>>({ ttlMs: 60_000, capacity: 10 });
    cache.put("  Buy Cheap PILLS \n", verdict("pills"));

    expect(cache.get("buy cheap pills")).toEqual(verdict("pills"));
    expect(cache.get("\tBUY CHEAP PILLS")).toEqual(verdict("pills"));
    expect(cache.get("buy  cheap pills")).toBeNull();
  });

  it("never returns an entry at or past its TTL", () => {
    const clock = new FakeClock();
    const cache = new ContentCache<string>({ ttlMs: 1000, capacity: 10, now: clock.now });
    cache.put("a", "A");

    clock.advance(999);
    expect(cache.get("a")).toBe("A");

    clock.advance(1);
    expect(cache.get("a")).toBeNull();
    expect(cache.size).toBe(0);
  });

  it("re-timestamps on overwrite", () => {
    const clock = new FakeClock();
    const cache = new ContentCache<string>({ ttlMs: 100, capacity: 10, now: clock.now });
    cache.put("a", "first");
    clock.advance(60);
    cache.put("A", "second");
    clock.advance(60);

    expect(cache.get("a")).toBe("second");
  });

  it("evicts expired entries first, then the oldest insertions", () => {
    const clock = new FakeClock();
    const cache = new ContentCache<string>({ ttlMs: 100, capacity: 10, now: clock.now });
    cache.put("old", "1");
    clock.advance(50);
    cache.put("young", "2");
    clock.advance(70);

    expect(cache.evict()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get("young")).toBe("2");
  });

  it("drops the oldest insertion when a put exceeds capacity", () => {
    const clock = new FakeClock();
    const cache = new ContentCache<string>({ ttlMs: 10_000, capacity: 2, now: clock.now });
    cache.put("a", "A");
    clock.advance(1);
    cache.put("b", "B");
    clock.advance(1);
    cache.put("a", "A2"); // a is now the newest
    clock.advance(1);
    cache.put("c", "C");

    expect(cache.size).toBe(2);
    expect(cache.get("b")).toBeNull();
    expect(cache.get("a")).toBe("A2");
    expect(cache.get("c")).toBe("C");
  });
});
