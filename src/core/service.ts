import { createSqlitePool, type SqliteHandle } from "../db/sqlite";
import type { Verdict } from "../types/common";
import { GeminiClassifier } from "../upstream/gemini";
import { HttpProfanityClassifier } from "../upstream/http";
import type { UpstreamClassifier } from "../upstream/types";
import { errorMessage } from "../util/errors";
import { createLogger, type Logger } from "../util/logger";
import { ClassificationClient } from "./classification-client";
import type { ModerationConfig } from "./config";
import { ContentCache } from "./content-cache";
import { handlePlatformEvent, type EnforcementResult, type PlatformEvent } from "./enforce";
import { KeywordMatcher } from "./keywords";
import { ViolationLedger } from "./ledger";
import { ModerationMetrics } from "./metrics";
import { ModerationOrchestrator } from "./moderate";
import type { ConnectionPool } from "./pool";
import { SlidingWindowLimiter } from "./rate-limiter";
import { UserCooldownGate } from "./user-cooldown";

export interface ModerationService {
  config: ModerationConfig;
  orchestrator: ModerationOrchestrator;
  client: ClassificationClient;
  ledger: ViolationLedger;
  pool: ConnectionPool<SqliteHandle>;
  metrics: ModerationMetrics;
  logger: Logger;
  /** Moderate one platform message and enforce the result under the configured options. */
  handle(event: PlatformEvent, signal?: AbortSignal): Promise<EnforcementResult>;
  /** Start periodic cache eviction and retention sweeps. */
  startMaintenance(intervalMs?: number): void;
  close(): void;
}

export interface ServiceOverrides {
  upstream?: UpstreamClassifier;
  now?: () => number;
  logger?: Logger;
}

export function createUpstream(config: ModerationConfig): UpstreamClassifier {
  if (config.provider === "gemini") {
    return new GeminiClassifier({
      apiKey: config.geminiApiKey,
      model: config.geminiModel,
      timeoutMs: config.requestTimeoutMs,
    });
  }
  return new HttpProfanityClassifier({ endpoint: config.apiEndpoint, timeoutMs: config.requestTimeoutMs });
}

export function createClassificationClient(
  config: ModerationConfig,
  upstream: UpstreamClassifier,
  logger: Logger,
  now: () => number = Date.now,
): ClassificationClient {
  return new ClassificationClient({
    upstream,
    limiter: new SlidingWindowLimiter({
      maxPerMinute: config.maxPerMinute,
      maxPerHour: config.maxPerHour,
      failureCooldownMs: config.failureCooldownSeconds * 1000,
      now,
    }),
    cache: new ContentCache<Verdict>({
      ttlMs: config.cacheTtlSeconds * 1000,
      capacity: config.cacheCapacity,
      now,
    }),
    retry: {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
    maxWaitSeconds: config.maxWaitSeconds,
    rateLimitedCooldownMs: config.rateLimitedCooldownSeconds * 1000,
    logger,
  });
}

/** Wire every component from one validated configuration. */
export function createModerationService(
  config: ModerationConfig,
  overrides: ServiceOverrides = {},
): ModerationService {
  const logger = overrides.logger ?? createLogger("moderation", { debug: config.debug });
  const now = overrides.now ?? Date.now;

  const pool = createSqlitePool(config.databasePath, {
    minSize: config.poolMinSize,
    maxSize: config.poolMaxSize,
    acquireTimeoutMs: config.poolAcquireTimeoutMs,
  });
  const ledger = new ViolationLedger(pool, {
    tierDurations: config.tierDurations,
    resetHour: config.resetHour,
    retentionDays: config.retentionDays,
    now,
    logger,
  });
  const client = createClassificationClient(config, overrides.upstream ?? createUpstream(config), logger, now);
  const metrics = new ModerationMetrics();
  const userCooldown = config.userCooldown ? new UserCooldownGate(config.userCooldownSeconds * 1000, now) : null;

  const orchestrator = new ModerationOrchestrator({
    client,
    ledger,
    keywords: new KeywordMatcher(config.keywords),
    metrics,
    localCheck: config.localCheck,
    autoBan: config.autoBan,
    monitoredGroups: config.monitoredGroups,
    userCooldown,
    logger,
  });

  let timer: NodeJS.Timeout | null = null;

  logger.info("moderation_started", {
    provider: config.provider,
    monitoredGroups: config.monitoredGroups.length,
    keywords: config.keywords.length,
    tierDurations: config.tierDurations,
    resetHour: config.resetHour,
    userCooldown: config.userCooldown,
  });

  return {
    config,
    orchestrator,
    client,
    ledger,
    pool,
    metrics,
    logger,
    handle(event, signal) {
      return handlePlatformEvent(
        orchestrator,
        event,
        {
          deleteMessages: config.deleteMessages,
          exemptRoles: config.exemptRoles,
          groupNotice: config.groupNotice,
          adminNotice: config.adminNotice,
          metrics,
          logger,
        },
        signal,
      );
    },
    startMaintenance(intervalMs = 10 * 60 * 1000) {
      if (timer) return;
      timer = setInterval(() => {
        const evicted = client.evictCache();
        userCooldown?.prune();
        ledger
          .purgeExpired()
          .then((purged) => logger.debug("maintenance_done", { evicted, purged }))
          .catch((err: unknown) => logger.error("maintenance_purge_failed", { error: errorMessage(err) }));
      }, intervalMs);
      timer.unref();
    },
    close() {
      if (timer) clearInterval(timer);
      timer = null;
      orchestrator.shutdown();
      pool.close();
      logger.info("moderation_stopped", {});
    },
  };
}
