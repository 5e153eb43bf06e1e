#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";

import { loadConfig } from "../core/config";
import { createModerationService, type ModerationService } from "../core/service";
import type { Verdict, ViolationRecord } from "../types/common";
import { errorMessage } from "../util/errors";
import { NOOP_LOGGER } from "../util/logger";

type GlobalOpts = { json?: boolean; db?: string };

function formatDuration(seconds: number): string {
  if (seconds >= 3600) return `${Math.floor(seconds / 3600)}h`;
  if (seconds >= 60) return `${Math.floor(seconds / 60)}m`;
  return `${seconds}s`;
}

function formatRecord(r: ViolationRecord): string {
  const words = r.forbiddenWords.slice(0, 3).join(", ") + (r.forbiddenWords.length > 3 ? ` (+${r.forbiddenWords.length - 3})` : "");
  return [
    `user: ${r.userName || "-"} (${r.userId})`,
    `violations: ${r.violationCount}`,
    `last: ${r.lastViolationDate}`,
    r.banDuration > 0 ? `ban: ${formatDuration(r.banDuration)}` : null,
    `words: ${words || "-"}`,
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}

function exitCodeFor(verdict: Verdict | null): number {
  if (verdict === null) return 2;
  return verdict.isViolation ? 3 : 0;
}

function print(value: unknown, jsonMode: boolean, human: () => string) {
  process.stdout.write((jsonMode ? JSON.stringify(value) : human()) + "\n");
}

async function withService(opts: GlobalOpts, fn: (service: ModerationService) => Promise<number>) {
  let service: ModerationService | null = null;
  try {
    const config = loadConfig(process.env, opts.db ? { databasePath: opts.db } : {});
    service = createModerationService(config, { logger: NOOP_LOGGER });
    process.exitCode = await fn(service);
  } catch (err) {
    console.error(`[error] ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    service?.close();
  }
}

const program = new Command();

program
  .name("moderate")
  .description("Forbidden-word moderation with escalating suspensions")
  .option("--json", "print raw JSON", false)
  .option("--db <path>", "violation database (overrides MODERATION_DB_PATH)");

program
  .command("check")
  .description("classify text without recording anything")
  .argument("<text...>", "text to check")
  .action(async (parts: string[]) => {
    const opts = program.opts<GlobalOpts>();
    const text = parts.join(" ");
    await withService(opts, async ({ orchestrator, client }) => {
      const local = orchestrator.matchLocal(text);
      const verdict: Verdict | null = local.length > 0 ? { isViolation: true, matchedTerms: local } : await client.classify(text);
      const source = local.length > 0 ? "local" : "upstream";
      print({ source, verdict }, !!opts.json, () => {
        if (verdict === null) return "result: UNKNOWN (classification unavailable, try again later)";
        if (!verdict.isViolation) return "result: CLEAN";
        return [`result: VIOLATION (${source})`, `words: ${verdict.matchedTerms.join(", ") || "-"}`].join("\n");
      });
      return exitCodeFor(verdict);
    });
  });

program
  .command("tier")
  .description("show the tier a user's next violation would land on")
  .argument("<groupId>")
  .argument("<userId>")
  .action(async (groupId: string, userId: string) => {
    const opts = program.opts<GlobalOpts>();
    await withService(opts, async ({ ledger }) => {
      const reading = await ledger.getCurrentTier(groupId, userId);
      const duration = ledger.durationForTier(reading.tier);
      print({ ...reading, duration }, !!opts.json, () =>
        [`next tier: ${reading.tier}`, `duration: ${formatDuration(duration)}`, `as of: ${reading.asOfDate}`].join("\n"),
      );
      return 0;
    });
  });

program
  .command("records")
  .description("list violation records for a group, or one user in it")
  .argument("<groupId>")
  .argument("[userId]")
  .action(async (groupId: string, userId: string | undefined) => {
    const opts = program.opts<GlobalOpts>();
    await withService(opts, async ({ ledger }) => {
      const records = userId ? await ledger.listRecords(groupId, userId) : await ledger.listGroupRecords(groupId);
      print(records, !!opts.json, () =>
        records.length === 0 ? "no violation records" : records.map(formatRecord).join("\n" + "-".repeat(20) + "\n"),
      );
      return 0;
    });
  });

program
  .command("reset")
  .description("delete violation records for a group, or one user in it")
  .argument("<groupId>")
  .argument("[userId]")
  .action(async (groupId: string, userId: string | undefined) => {
    const opts = program.opts<GlobalOpts>();
    await withService(opts, async ({ ledger }) => {
      const removed = await ledger.resetRecords(groupId, userId);
      print({ removed }, !!opts.json, () => `removed ${removed} record(s) for ${userId ? `user ${userId}` : `group ${groupId}`}`);
      return 0;
    });
  });

program
  .command("purge")
  .description("delete records past the retention window")
  .action(async () => {
    const opts = program.opts<GlobalOpts>();
    await withService(opts, async ({ ledger }) => {
      const removed = await ledger.purgeExpired();
      print({ removed }, !!opts.json, () => `purged ${removed} expired record(s)`);
      return 0;
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[error] ${errorMessage(err)}`);
  process.exitCode = 1;
});
