import { abortError, PoolClosedError, PoolExhaustedError } from "../util/errors";

export interface PoolOptions<T> {
  create: () => T;
  destroy?: (handle: T) => void;
  /** Handles opened up front. */
  minSize?: number;
  maxSize?: number;
  /** How long `acquire` may wait for a release before failing. */
  acquireTimeoutMs?: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  leased: number;
  waiting: number;
  maxSize: number;
  created: number;
  exhausted: number;
}

interface Waiter<T> {
  resolve: (handle: T) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
  cleanup: () => void;
}

/**
 * Bounded set of reusable storage handles.
 *
 * Bookkeeping is synchronous, so it cannot interleave; the caller runs its work
 * on the handle outside of it. Waiters are queued FIFO and woken by `release`
 * handing the handle over directly.
 */
export class ConnectionPool<T> {
  private readonly create: () => T;
  private readonly destroy: (handle: T) => void;
  private readonly maxSize: number;
  private readonly acquireTimeoutMs: number;

  private readonly idle: T[] = [];
  private readonly leased = new Set<T>();
  private readonly waiters: Waiter<T>[] = [];
  private createdCount = 0;
  private exhaustedCount = 0;
  private closed = false;

  constructor(opts: PoolOptions<T>) {
    this.create = opts.create;
    this.destroy = opts.destroy ?? (() => undefined);
    this.maxSize = Math.max(1, opts.maxSize ?? 10);
    this.acquireTimeoutMs = opts.acquireTimeoutMs ?? 5_000;

    const warm = Math.min(opts.minSize ?? 5, this.maxSize);
    for (let i = 0; i < warm; i++) this.idle.push(this.open());
  }

  acquire(signal?: AbortSignal): Promise<T> {
    if (this.closed) return Promise.reject(new PoolClosedError());
    if (signal?.aborted) return Promise.reject(abortError());

    const reused = this.idle.pop();
    if (reused !== undefined) {
      this.leased.add(reused);
      return Promise.resolve(reused);
    }

    if (this.total < this.maxSize) {
      try {
        const handle = this.open();
        this.leased.add(handle);
        return Promise.resolve(handle);
      } catch (err) {
        return Promise.reject(err);
      }
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(waiter);
        reject(abortError());
      };
      const timer = setTimeout(() => {
        this.removeWaiter(waiter);
        this.exhaustedCount++;
        reject(new PoolExhaustedError(this.acquireTimeoutMs));
      }, this.acquireTimeoutMs);
      const waiter: Waiter<T> = {
        resolve,
        reject,
        timer,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Return a handle. Releasing one that is not currently leased does nothing. */
  release(handle: T): void {
    if (!this.leased.delete(handle)) return;

    if (this.closed) {
      this.destroy(handle);
      return;
    }

    const next = this.waiters.shift();
    if (next) {
      next.cleanup();
      this.leased.add(handle);
      next.resolve(handle);
      return;
    }

    this.idle.push(handle);
  }

  /** Acquire, run `fn`, release on every exit path. */
  async use<R>(fn: (handle: T) => R | Promise<R>, signal?: AbortSignal): Promise<R> {
    const handle = await this.acquire(signal);
    try {
      return await fn(handle);
    } finally {
      this.release(handle);
    }
  }

  stats(): PoolStats {
    return {
      total: this.total,
      idle: this.idle.length,
      leased: this.leased.size,
      waiting: this.waiters.length,
      maxSize: this.maxSize,
      created: this.createdCount,
      exhausted: this.exhaustedCount,
    };
  }

  /** Fail pending waiters and close idle handles; leased ones close as they come back. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.reject(new PoolClosedError());
    }
    for (const handle of this.idle.splice(0)) this.destroy(handle);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private get total(): number {
    return this.idle.length + this.leased.size;
  }

  private open(): T {
    const handle = this.create();
    this.createdCount++;
    return handle;
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) this.waiters.splice(idx, 1);
    waiter.cleanup();
  }
}
