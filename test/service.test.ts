import { afterEach, describe, it, expect } from "vitest";
import { loadConfig } from "../src/core/config";
import { createModerationService, type ModerationService } from "../src/core/service";
import { NOOP_LOGGER } from "../src/util/logger";
import { FakeEvent, FakeUpstream, tempDbPath } from "./helpers";

describe("ModerationService.handle", () => {
  const cleanups: Array<() => void> = [];
  afterEach(() => {
    for (const fn of cleanups.splice(0)) fn();
  });

  function serviceFrom(env: NodeJS.ProcessEnv): ModerationService {
    const db = tempDbPath();
    const config = loadConfig({ MODERATION_DB_PATH: db.file, MODERATION_POOL_MIN: "1", ...env });
    const service = createModerationService(config, {
      upstream: new FakeUpstream([{ isViolation: true, matchedTerms: ["spam"] }]),
      logger: NOOP_LOGGER,
    });
    cleanups.push(() => {
      service.close();
      db.cleanup();
    });
    return service;
  }

  it("deletes, suspends and notifies under the defaults", async () => {
    const service = serviceFrom({});
    const event = new FakeEvent("buy spam");

    const result = await service.handle(event);

    expect(result).toMatchObject({ deleted: true, banned: true, groupNotified: true, adminsNotified: true });
    expect(event.bans).toEqual([60]);
    expect(service.metrics.snapshot().autoBans).toBe(1);
  });

  it("keeps the message when deletion is switched off", async () => {
    const service = serviceFrom({ MODERATION_DELETE_MESSAGES: "off" });
    const event = new FakeEvent("buy spam");

    expect(await service.handle(event)).toMatchObject({ deleted: false, banned: true });
    expect(event.deleted).toBe(0);
  });

  it("spares the configured exempt roles", async () => {
    const service = serviceFrom({ MODERATION_EXEMPT_ROLES: "moderator" });
    const moderator = new FakeEvent("buy spam", "Moderator");

    expect(await service.handle(moderator)).toMatchObject({ deleted: true, banned: false });
    expect(moderator.bans).toEqual([]);
  });

  it("suspends roles dropped from the exempt list", async () => {
    const service = serviceFrom({ MODERATION_EXEMPT_ROLES: "moderator" });
    const admin = new FakeEvent("buy spam", "admin");

    expect(await service.handle(admin)).toMatchObject({ banned: true });
    expect(admin.bans).toEqual([60]);
  });

  it("sends only the notices left switched on", async () => {
    const service = serviceFrom({ MODERATION_GROUP_NOTICE: "no", MODERATION_ADMIN_NOTICE: "yes" });
    const event = new FakeEvent("buy spam");

    expect(await service.handle(event)).toMatchObject({ groupNotified: false, adminsNotified: true });
    expect(event.groupNotices).toEqual([]);
    expect(event.adminNotices).toHaveLength(1);
  });
});
