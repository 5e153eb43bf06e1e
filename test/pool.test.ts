import { describe, it, expect } from "vitest";
import { ConnectionPool } from "../src/core/pool";
import { PoolClosedError, PoolExhaustedError } from "../src/util/errors";

interface FakeHandle {
  id: number;
  closed: boolean;
}

function fakePool(opts: { minSize?: number; maxSize?: number; acquireTimeoutMs?: number } = {}) {
  let next = 0;
  const created: FakeHandle[] = [];
  const pool = new ConnectionPool<FakeHandle>({
    create: () => {
      const handle = { id: ++next, closed: false };
      created.push(handle);
      return handle;
    },
    destroy: (h) => {
      h.closed = true;
    },
    ...opts,
  });
  return { pool, created };
}

describe("ConnectionPool", () => {
  it("pre-warms minSize handles", () => {
    const { pool } = fakePool({ minSize: 2, maxSize: 4 });
    expect(pool.stats()).toMatchObject({ total: 2, idle: 2, leased: 0, created: 2 });
  });

  it("reuses idle handles before opening new ones, up to maxSize", async () => {
    const { pool } = fakePool({ minSize: 1, maxSize: 2 });
    const a = await pool.acquire();
    const b = await pool.acquire();
    expect(a.id).toBe(1);
    expect(b.id).toBe(2);

    pool.release(a);
    const c = await pool.acquire();
    expect(c).toBe(a);
    expect(pool.stats().created).toBe(2);
  });

  it("hands a released handle straight to the first waiter", async () => {
    const { pool } = fakePool({ minSize: 1, maxSize: 1, acquireTimeoutMs: 1000 });
    const held = await pool.acquire();

    const waiting = pool.acquire();
    expect(pool.stats().waiting).toBe(1);

    pool.release(held);
    await expect(waiting).resolves.toBe(held);
    expect(pool.stats()).toMatchObject({ leased: 1, idle: 0, waiting: 0 });
  });

  it("fails with PoolExhaustedError after the acquire timeout", async () => {
    const { pool } = fakePool({ minSize: 1, maxSize: 1, acquireTimeoutMs: 20 });
    await pool.acquire();

    await expect(pool.acquire()).rejects.toBeInstanceOf(PoolExhaustedError);
    expect(pool.stats()).toMatchObject({ waiting: 0, exhausted: 1 });
  });

  it("ignores a second release of the same handle", async () => {
    const { pool } = fakePool({ minSize: 1, maxSize: 3 });
    const h = await pool.acquire();
    pool.release(h);
    pool.release(h);
    expect(pool.stats()).toMatchObject({ idle: 1, leased: 0, total: 1 });
  });

  it("releases on the error path of use()", async () => {
    const { pool } = fakePool({ minSize: 1, maxSize: 1 });
    await expect(
      pool.use(() => {
        throw new Error("query failed");
      }),
    ).rejects.toThrow("query failed");
    expect(pool.stats()).toMatchObject({ idle: 1, leased: 0 });
  });

  it("removes an aborted waiter without leaking a handle", async () => {
    const { pool } = fakePool({ minSize: 1, maxSize: 1, acquireTimeoutMs: 1000 });
    const held = await pool.acquire();
    const controller = new AbortController();

    const waiting = pool.acquire(controller.signal);
    controller.abort();
    await expect(waiting).rejects.toMatchObject({ name: "AbortError" });

    pool.release(held);
    expect(pool.stats()).toMatchObject({ idle: 1, leased: 0, waiting: 0 });
  });

  it("rejects waiters and destroys handles on close", async () => {
    const { pool, created } = fakePool({ minSize: 2, maxSize: 2, acquireTimeoutMs: 1000 });
    const a = await pool.acquire();
    const b = await pool.acquire();
    const waiting = pool.acquire();

    pool.close();
    await expect(waiting).rejects.toBeInstanceOf(PoolClosedError);
    await expect(pool.acquire()).rejects.toBeInstanceOf(PoolClosedError);

    pool.release(a);
    pool.release(b);
    expect(created.every((h) => h.closed)).toBe(true);
  });
});
