/**
 * Error taxonomy for the moderation pipeline.
 * Read paths absorb these and fall back to safe defaults; write paths let them through.
 */

export class ModerationError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "ModerationError";
    this.code = code;
  }
}

/** Fatal at construction: a tunable could not be parsed or is out of range. */
export class ConfigurationInvalidError extends ModerationError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`, "CONFIGURATION_INVALID");
    this.name = "ConfigurationInvalidError";
    this.issues = issues;
  }
}

/** No storage handle became free within the acquire timeout. Retryable. */
export class PoolExhaustedError extends ModerationError {
  public readonly waitedMs: number;

  constructor(waitedMs: number) {
    super(`no connection became available within ${waitedMs}ms`, "POOL_EXHAUSTED");
    this.name = "PoolExhaustedError";
    this.waitedMs = waitedMs;
  }
}

export class PoolClosedError extends ModerationError {
  constructor() {
    super("connection pool is closed", "POOL_CLOSED");
    this.name = "PoolClosedError";
  }
}

/** Transport error, non-2xx status or unreadable body from the classification service. */
export class UpstreamError extends ModerationError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message, status === 429 ? "UPSTREAM_RATE_LIMITED" : "UPSTREAM_FAILED");
    this.name = "UpstreamError";
    this.status = status;
  }

  get rateLimited(): boolean {
    return this.status === 429;
  }
}

/** A stored row did not match the expected shape. */
export class StorageCorruptReadError extends ModerationError {
  constructor(detail: string) {
    super(`malformed violation record: ${detail}`, "STORAGE_CORRUPT_READ");
    this.name = "StorageCorruptReadError";
  }
}

export function abortError(reason = "operation aborted"): Error {
  return Object.assign(new Error(reason), { name: "AbortError" });
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
