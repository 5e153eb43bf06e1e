import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/core/config";
import { ConfigurationInvalidError } from "../src/util/errors";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      provider: "http",
      maxPerMinute: 30,
      maxPerHour: 600,
      tierDurations: [60, 600, 86_400],
      resetHour: 4,
      retentionDays: 30,
      poolMinSize: 5,
      poolMaxSize: 10,
      userCooldown: false,
      exemptRoles: ["owner", "admin"],
      deleteMessages: true,
      groupNotice: true,
      adminNotice: true,
    });
  });

  it("reads and coerces environment variables", () => {
    const cfg = loadConfig({
      MODERATION_MAX_PER_MINUTE: "2",
      MODERATION_BAN_DURATIONS: "30, 300",
      MODERATION_RESET_HOUR: "0",
      MODERATION_KEYWORDS: "spam, scam,,",
      MODERATION_AUTO_BAN: "off",
      MODERATION_DEBUG: "yes",
      MODERATION_DB_PATH: "   ",
    });

    expect(cfg.maxPerMinute).toBe(2);
    expect(cfg.tierDurations).toEqual([30, 300]);
    expect(cfg.resetHour).toBe(0);
    expect(cfg.keywords).toEqual(["spam", "scam"]);
    expect(cfg.autoBan).toBe(false);
    expect(cfg.debug).toBe(true);
    expect(cfg.databasePath).toBe("data/violations.db");
  });

  it("lets explicit overrides win over the environment", () => {
    const cfg = loadConfig({ MODERATION_DB_PATH: "from-env.db" }, { databasePath: ":memory:" });
    expect(cfg.databasePath).toBe(":memory:");
  });

  it("reports every invalid key at once", () => {
    let caught: unknown;
    try {
      loadConfig({ MODERATION_RESET_HOUR: "24", MODERATION_MAX_PER_MINUTE: "abc", MODERATION_AUTO_BAN: "maybe" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationInvalidError);
    const issues = caught instanceof ConfigurationInvalidError ? caught.issues.map((i) => i.split(":")[0]) : [];
    expect(issues.sort()).toEqual(["autoBan", "maxPerMinute", "resetHour"]);
  });

  it("checks relations between tunables", () => {
    expect(() => loadConfig({ MODERATION_MAX_PER_MINUTE: "50", MODERATION_MAX_PER_HOUR: "10" })).toThrow(
      "maxPerHour: must be >= maxPerMinute",
    );
    expect(() => loadConfig({ MODERATION_PROVIDER: "gemini" })).toThrow("geminiApiKey: required when provider is gemini");
    expect(() => loadConfig({}, { tierDurations: [] })).toThrow("tierDurations: at least one duration is required");
  });
});
