import type { ModerationDecision, ModerationOutcome } from "../types/common";
import { errorMessage } from "../util/errors";
import { NOOP_LOGGER, preview, type Logger } from "../util/logger";
import type { ModerationMetrics } from "./metrics";
import type { ModerationOrchestrator } from "./moderate";

/** Tier from which a violation is reported as severe. */
export const SEVERE_TIER = 3;

/** Violation details handed to the platform for notices; wording is up to the platform. */
export interface ViolationNotice {
  groupId: string;
  userId: string;
  userName: string;
  tier: number;
  duration: number;
  banned: boolean;
  severe: boolean;
  matchedWords: string[];
  textPreview: string;
  violationDay: string;
}

/** What a chat platform must expose for one inbound group message. */
export interface PlatformEvent {
  getGroupId(): string;
  getUserId(): string;
  getUserName(): string;
  /** e.g. "owner", "admin", "member"; null when the platform cannot tell. */
  getRole(): Promise<string | null>;
  getText(): string;
  deleteMessage(): Promise<void>;
  setBan(durationSeconds: number): Promise<void>;
  /** Post a notice in the group the message came from. */
  sendGroupNotice(notice: ViolationNotice): Promise<void>;
  /** Tell the moderators privately. */
  notifyAdmins(notice: ViolationNotice): Promise<void>;
}

export interface EnforcementOptions {
  deleteMessages?: boolean;
  /** Roles never suspended, compared case-insensitively. */
  exemptRoles?: readonly string[];
  groupNotice?: boolean;
  /** Sent on every violation, banned or not. */
  adminNotice?: boolean;
  metrics?: ModerationMetrics;
  logger?: Logger;
}

export interface EnforcementActions {
  deleted: boolean;
  banned: boolean;
  groupNotified: boolean;
  adminsNotified: boolean;
}

export interface EnforcementResult extends EnforcementActions {
  outcome: ModerationOutcome;
}

const NO_ACTIONS: EnforcementActions = { deleted: false, banned: false, groupNotified: false, adminsNotified: false };

/** Apply a decision. Platform failures are logged and reported, never thrown. */
export async function enforceDecision(
  event: PlatformEvent,
  decision: ModerationDecision,
  opts: EnforcementOptions = {},
): Promise<EnforcementActions> {
  const logger = opts.logger ?? NOOP_LOGGER;
  const exempt = new Set((opts.exemptRoles ?? ["owner", "admin"]).map((r) => r.toLowerCase()));
  let deleted = false;
  let banned = false;

  if (opts.deleteMessages ?? true) {
    try {
      await event.deleteMessage();
      deleted = true;
    } catch (err) {
      logger.error("delete_message_failed", { groupId: decision.groupId, userId: decision.userId, error: errorMessage(err) });
    }
  }

  if (decision.duration > 0) {
    let role: string | null = null;
    try {
      role = await event.getRole();
    } catch (err) {
      logger.warn("role_lookup_failed", { userId: decision.userId, error: errorMessage(err) });
    }

    if (role !== null && exempt.has(role.toLowerCase())) {
      logger.info("ban_skipped_exempt_role", { groupId: decision.groupId, userId: decision.userId, role });
    } else {
      try {
        await event.setBan(decision.duration);
        banned = true;
        opts.metrics?.recordBan(decision.groupId, decision.userId, decision.matchedWords);
      } catch (err) {
        logger.error("ban_failed", { groupId: decision.groupId, userId: decision.userId, error: errorMessage(err) });
      }
    }
  }

  const notice: ViolationNotice = {
    groupId: decision.groupId,
    userId: decision.userId,
    userName: event.getUserName(),
    tier: decision.tier,
    duration: decision.duration,
    banned,
    severe: decision.tier >= SEVERE_TIER,
    matchedWords: decision.matchedWords,
    textPreview: preview(decision.sourceText, 100),
    violationDay: decision.violationDay,
  };

  let groupNotified = false;
  if (opts.groupNotice ?? true) {
    try {
      await event.sendGroupNotice(notice);
      groupNotified = true;
    } catch (err) {
      logger.error("group_notice_failed", { groupId: decision.groupId, error: errorMessage(err) });
    }
  }

  let adminsNotified = false;
  if (opts.adminNotice ?? true) {
    try {
      await event.notifyAdmins(notice);
      adminsNotified = true;
    } catch (err) {
      logger.error("admin_notice_failed", { groupId: decision.groupId, userId: decision.userId, error: errorMessage(err) });
    }
  }

  return { deleted, banned, groupNotified, adminsNotified };
}

/** Run one platform message through the pipeline and act on the result. */
export async function handlePlatformEvent(
  orchestrator: ModerationOrchestrator,
  event: PlatformEvent,
  opts: EnforcementOptions = {},
  signal?: AbortSignal,
): Promise<EnforcementResult> {
  const outcome = await orchestrator.moderate(
    {
      groupId: event.getGroupId(),
      userId: event.getUserId(),
      userName: event.getUserName(),
      text: event.getText(),
    },
    signal,
  );

  if (outcome.kind !== "violation") return { outcome, ...NO_ACTIONS };

  const applied = await enforceDecision(event, outcome.decision, {
    ...opts,
    metrics: opts.metrics ?? orchestrator.getMetrics(),
  });
  return { outcome, ...applied };
}
