import type { InboundMessage, ModerationOutcome, Verdict, VerdictSource } from "../types/common";
import { NOOP_LOGGER, preview, type Logger } from "../util/logger";
import { KeywordMatcher } from "./keywords";
import type { ViolationLedger } from "./ledger";
import { ModerationMetrics } from "./metrics";
import type { UserCooldownGate } from "./user-cooldown";

/** Small interface to enable DI/mocking in tests */
export interface TextClassifier {
  classify(text: string, signal?: AbortSignal): Promise<Verdict | null>;
}

export interface OrchestratorOptions {
  client: TextClassifier;
  ledger: ViolationLedger;
  keywords?: KeywordMatcher;
  metrics?: ModerationMetrics;
  /** Run the local keyword pass before asking upstream. */
  localCheck?: boolean;
  /** When off, violations are still recorded but with a zero duration. */
  autoBan?: boolean;
  /** Groups to watch; empty means every group. */
  monitoredGroups?: readonly string[];
  userCooldown?: UserCooldownGate | null;
  logger?: Logger;
}

/**
 * Local keywords -> upstream classifier -> violation ledger.
 * Returns what the caller should do; deleting or muting is left to the platform side.
 */
export class ModerationOrchestrator {
  private client: TextClassifier;
  private keywords: KeywordMatcher;
  private readonly ledger: ViolationLedger;
  private readonly metrics: ModerationMetrics;
  private readonly localCheck: boolean;
  private readonly autoBan: boolean;
  private readonly monitoredGroups: ReadonlySet<string>;
  private readonly userCooldown: UserCooldownGate | null;
  private readonly logger: Logger;
  private readonly lifecycle = new AbortController();

  constructor(opts: OrchestratorOptions) {
    this.client = opts.client;
    this.ledger = opts.ledger;
    this.keywords = opts.keywords ?? new KeywordMatcher([]);
    this.metrics = opts.metrics ?? new ModerationMetrics();
    this.localCheck = opts.localCheck ?? true;
    this.autoBan = opts.autoBan ?? true;
    this.monitoredGroups = new Set(opts.monitoredGroups ?? []);
    this.userCooldown = opts.userCooldown ?? null;
    this.logger = opts.logger ?? NOOP_LOGGER;
  }

  /**
   * Decide on one inbound message. Ledger write failures propagate so a
   * violation is never silently dropped; an undetermined upstream verdict
   * comes back as `unknown`.
   */
  async moderate(message: InboundMessage, signal?: AbortSignal): Promise<ModerationOutcome> {
    const { groupId, userId, userName, text } = message;

    if (!text.trim()) return { kind: "skipped", reason: "empty_text" };
    if (this.monitoredGroups.size > 0 && !this.monitoredGroups.has(groupId)) {
      this.logger.debug("group_not_monitored", { groupId });
      return { kind: "skipped", reason: "group_not_monitored" };
    }
    if (this.userCooldown && !this.userCooldown.admit(userId)) {
      this.logger.debug("user_in_cooldown", { groupId, userId });
      return { kind: "skipped", reason: "user_cooldown" };
    }

    const { signal: combined, dispose } = linkSignals(this.lifecycle.signal, signal);
    try {
      let words: string[];
      let source: VerdictSource;

      const local = this.localCheck ? this.keywords.match(text) : { hit: false, words: [] };
      if (local.hit) {
        words = local.words;
        source = "local";
      } else {
        const verdict = await this.client.classify(text, combined);
        if (verdict === null) {
          this.metrics.recordUnknown();
          this.logger.info("verdict_unknown", { groupId, userId });
          return { kind: "unknown" };
        }
        if (!verdict.isViolation) {
          this.metrics.recordCheck(groupId, userId, [], false);
          return { kind: "clean" };
        }
        words = verdict.matchedTerms;
        source = "upstream";
      }

      const recorded = await this.ledger.recordViolation(
        { groupId, userId, userName, words, text, banDuration: this.autoBan ? undefined : 0 },
        combined,
      );
      this.metrics.recordCheck(groupId, userId, words, true);
      this.logger.info("violation_recorded", {
        groupId,
        userId,
        source,
        words,
        tier: recorded.tier,
        duration: recorded.banDuration,
        text: preview(text),
      });

      return {
        kind: "violation",
        decision: {
          groupId,
          userId,
          tier: recorded.tier,
          duration: recorded.banDuration,
          matchedWords: words,
          sourceText: text,
          source,
          violationDay: recorded.violationDay,
        },
      };
    } finally {
      dispose();
    }
  }

  /** Local keyword check only, no ledger write. */
  matchLocal(text: string): string[] {
    return this.keywords.match(text).words;
  }

  getKeywords(): KeywordMatcher {
    return this.keywords;
  }

  /** Swap the keyword matcher; in-flight checks keep the one they started with. */
  setKeywords(matcher: KeywordMatcher): void {
    this.keywords = matcher;
  }

  setClient(client: TextClassifier): void {
    this.client = client;
  }

  getMetrics(): ModerationMetrics {
    return this.metrics;
  }

  getLedger(): ViolationLedger {
    return this.ledger;
  }

  /** Abort pending rate-limit waits and backoffs. */
  shutdown(): void {
    this.lifecycle.abort();
  }
}

function linkSignals(
  primary: AbortSignal,
  secondary?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  if (!secondary) return { signal: primary, dispose: () => undefined };

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (primary.aborted || secondary.aborted) controller.abort();
  primary.addEventListener("abort", onAbort, { once: true });
  secondary.addEventListener("abort", onAbort, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      primary.removeEventListener("abort", onAbort);
      secondary.removeEventListener("abort", onAbort);
    },
  };
}
