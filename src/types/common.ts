/**
 * Classification outcome for one piece of text. `null` where a Verdict is
 * expected means "could not determine" and must never be read as clean.
 */
export interface Verdict {
  isViolation: boolean;
  matchedTerms: string[];
}

/** Current escalation cycle for one (group, user) pair. */
export interface ViolationRecord {
  groupId: string;
  userId: string;
  userName: string;
  violationCount: number;
  forbiddenWords: string[];
  originalText: string;
  banDuration: number; // seconds, 0 when no suspension applied
  lastViolationDate: string; // yyyy-MM-dd violation day
  createdAt: number; // epoch ms
}

export type VerdictSource = "local" | "upstream";

/** What the caller should act on. The pipeline itself performs no platform side effects. */
export interface ModerationDecision {
  groupId: string;
  userId: string;
  tier: number;
  duration: number;
  matchedWords: string[];
  sourceText: string;
  source: VerdictSource;
  violationDay: string;
}

export type SkipReason = "empty_text" | "group_not_monitored" | "user_cooldown";

export type ModerationOutcome =
  | { kind: "violation"; decision: ModerationDecision }
  | { kind: "clean" }
  | { kind: "unknown" }
  | { kind: "skipped"; reason: SkipReason };

export interface InboundMessage {
  groupId: string;
  userId: string;
  userName: string;
  text: string;
}
