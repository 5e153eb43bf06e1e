import { z } from "zod";

import { ConfigurationInvalidError } from "../util/errors";

const flag = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
    .transform((v) => v === "true" || v === "1" || v === "yes" || v === "on"),
]);

const stringList = z.union([
  z.array(z.string()),
  z.string().transform((raw) =>
    raw
      .split(",")
      .map((v) => v.trim())
      .filter(Boolean),
  ),
]);

const numberList = z.union([
  z.array(z.number().int().min(0)),
  z.string().transform((raw, ctx) => {
    const values = raw.split(",").map((v) => Number(v.trim()));
    if (values.some((v) => !Number.isInteger(v) || v < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected comma-separated non-negative integers" });
      return z.NEVER;
    }
    return values;
  }),
]);

const int = (min: number, max = Number.MAX_SAFE_INTEGER) => z.coerce.number().int().min(min).max(max);

export const ConfigSchema = z
  .object({
    provider: z.enum(["http", "gemini"]).default("http"),
    apiEndpoint: z.string().url().default("https://uapis.cn/api/v1/text/profanitycheck"),
    geminiApiKey: z.string().min(1).optional(),
    geminiModel: z.string().min(1).default("gemini-2.0-flash"),
    requestTimeoutMs: int(100).default(10_000),

    maxPerMinute: int(1).default(30),
    maxPerHour: int(1).default(600),
    failureCooldownSeconds: int(0).default(30),
    rateLimitedCooldownSeconds: int(0).default(60),
    maxWaitSeconds: z.coerce.number().min(0).default(5),

    cacheTtlSeconds: int(1).default(3600),
    cacheCapacity: int(1).default(1000),

    maxRetries: int(0, 10).default(2),
    retryBaseDelayMs: int(0).default(500),
    retryMaxDelayMs: int(0).default(8000),

    tierDurations: numberList.default([60, 600, 86_400]),
    resetHour: int(0, 23).default(4),
    retentionDays: int(1).default(30),

    databasePath: z.string().min(1).default("data/violations.db"),
    poolMinSize: int(1).default(5),
    poolMaxSize: int(1).default(10),
    poolAcquireTimeoutMs: int(1).default(5000),

    keywords: stringList.default([]),
    monitoredGroups: stringList.default([]),
    exemptRoles: stringList.default(["owner", "admin"]),

    localCheck: flag.default(true),
    autoBan: flag.default(true),
    deleteMessages: flag.default(true),
    groupNotice: flag.default(true),
    adminNotice: flag.default(true),
    userCooldown: flag.default(false),
    userCooldownSeconds: int(0).default(60),
    debug: flag.default(false),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.tierDurations.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["tierDurations"], message: "at least one duration is required" });
    }
    if (cfg.maxPerHour < cfg.maxPerMinute) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["maxPerHour"], message: "must be >= maxPerMinute" });
    }
    if (cfg.poolMaxSize < cfg.poolMinSize) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["poolMaxSize"], message: "must be >= poolMinSize" });
    }
    if (cfg.retryMaxDelayMs < cfg.retryBaseDelayMs) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["retryMaxDelayMs"], message: "must be >= retryBaseDelayMs" });
    }
    if (cfg.provider === "gemini" && !cfg.geminiApiKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["geminiApiKey"], message: "required when provider is gemini" });
    }
  });

export type ModerationConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

const ENV_KEYS: Record<keyof ConfigInput, string> = {
  provider: "MODERATION_PROVIDER",
  apiEndpoint: "MODERATION_API_ENDPOINT",
  geminiApiKey: "GEMINI_API_KEY",
  geminiModel: "GEMINI_MODEL",
  requestTimeoutMs: "MODERATION_REQUEST_TIMEOUT_MS",
  maxPerMinute: "MODERATION_MAX_PER_MINUTE",
  maxPerHour: "MODERATION_MAX_PER_HOUR",
  failureCooldownSeconds: "MODERATION_FAILURE_COOLDOWN_SECONDS",
  rateLimitedCooldownSeconds: "MODERATION_RATE_LIMITED_COOLDOWN_SECONDS",
  maxWaitSeconds: "MODERATION_MAX_WAIT_SECONDS",
  cacheTtlSeconds: "MODERATION_CACHE_TTL_SECONDS",
  cacheCapacity: "MODERATION_CACHE_CAPACITY",
  maxRetries: "MODERATION_MAX_RETRIES",
  retryBaseDelayMs: "MODERATION_RETRY_BASE_MS",
  retryMaxDelayMs: "MODERATION_RETRY_MAX_MS",
  tierDurations: "MODERATION_BAN_DURATIONS",
  resetHour: "MODERATION_RESET_HOUR",
  retentionDays: "MODERATION_RETENTION_DAYS",
  databasePath: "MODERATION_DB_PATH",
  poolMinSize: "MODERATION_POOL_MIN",
  poolMaxSize: "MODERATION_POOL_MAX",
  poolAcquireTimeoutMs: "MODERATION_POOL_ACQUIRE_TIMEOUT_MS",
  keywords: "MODERATION_KEYWORDS",
  monitoredGroups: "MODERATION_MONITORED_GROUPS",
  exemptRoles: "MODERATION_EXEMPT_ROLES",
  localCheck: "MODERATION_LOCAL_CHECK",
  autoBan: "MODERATION_AUTO_BAN",
  deleteMessages: "MODERATION_DELETE_MESSAGES",
  groupNotice: "MODERATION_GROUP_NOTICE",
  adminNotice: "MODERATION_ADMIN_NOTICE",
  userCooldown: "MODERATION_USER_COOLDOWN",
  userCooldownSeconds: "MODERATION_USER_COOLDOWN_SECONDS",
  debug: "MODERATION_DEBUG",
};

/**
 * Read tunables from the environment (unset and empty variables fall back to
 * defaults), apply `overrides`, validate. Throws ConfigurationInvalidError
 * listing every bad key.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ConfigInput> = {},
): ModerationConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") raw[key] = value.trim();
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationInvalidError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
