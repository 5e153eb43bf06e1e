export * from "./types/common";
export * from "./util/errors";
export { createLogger, NOOP_LOGGER, type Logger } from "./util/logger";
export { violationDay, retentionCutoff } from "./util/violation-day";

export { SlidingWindowLimiter, type AcquireResult, type RateLimiterOptions } from "./core/rate-limiter";
export { ContentCache, type ContentCacheOptions } from "./core/content-cache";
export { RetryPolicy, type RetryOptions, type RetryOutcome } from "./core/retry";
export { ConnectionPool, type PoolOptions, type PoolStats } from "./core/pool";
export { ClassificationClient, type ClassificationClientOptions, type ClassificationStats } from "./core/classification-client";
export { ViolationLedger, type LedgerOptions, type RecordViolationInput, type RecordedViolation, type TierReading } from "./core/ledger";
export { KeywordMatcher, type KeywordMatch } from "./core/keywords";
export { ModerationMetrics, type MetricsSnapshot } from "./core/metrics";
export { UserCooldownGate } from "./core/user-cooldown";
export { ModerationOrchestrator, type OrchestratorOptions, type TextClassifier } from "./core/moderate";
export {
  enforceDecision,
  handlePlatformEvent,
  SEVERE_TIER,
  type PlatformEvent,
  type ViolationNotice,
  type EnforcementOptions,
  type EnforcementActions,
  type EnforcementResult,
} from "./core/enforce";
export { loadConfig, ConfigSchema, type ModerationConfig, type ConfigInput } from "./core/config";
export { createModerationService, type ModerationService } from "./core/service";

export { createSqlitePool, openSqlite, type SqliteHandle } from "./db/sqlite";
export type { UpstreamClassifier } from "./upstream/types";
export { HttpProfanityClassifier } from "./upstream/http";
export { GeminiClassifier } from "./upstream/gemini";
