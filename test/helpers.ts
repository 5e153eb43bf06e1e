import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { PlatformEvent, ViolationNotice } from "../src/core/enforce";
import type { Verdict } from "../src/types/common";
import type { UpstreamClassifier } from "../src/upstream/types";

/** Local wall-clock time in ms, the way the ledger sees it. */
export function at(year: number, month: number, day: number, hour: number, minute = 0): number {
  return new Date(year, month - 1, day, hour, minute).getTime();
}

export class FakeClock {
  constructor(public t = at(2026, 3, 10, 12)) {}
  now = (): number => this.t;
  advance(ms: number): void {
    this.t += ms;
  }
  /** Sleep that moves the clock instead of waiting. */
  sleep = async (ms: number): Promise<void> => {
    this.t += ms;
  };
}

export function tempDbPath(): { file: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-"));
  return {
    file: path.join(dir, "violations.db"),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

type Step = Verdict | Error;

/** Plays back scripted results; the last one repeats. */
export class FakeUpstream implements UpstreamClassifier {
  calls: string[] = [];
  constructor(private readonly steps: Step[]) {}

  async classify(text: string): Promise<Verdict> {
    this.calls.push(text);
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  }
}

export const CLEAN: Verdict = { isViolation: false, matchedTerms: [] };

/** One group message from "Alice" (u1) in g1; records every action taken on it. */
export class FakeEvent implements PlatformEvent {
  deleted = 0;
  bans: number[] = [];
  groupNotices: ViolationNotice[] = [];
  adminNotices: ViolationNotice[] = [];
  failDelete = false;
  failBan = false;
  failGroupNotice = false;
  failAdminNotice = false;

  constructor(
    private readonly text: string,
    private readonly role: string | null = "member",
  ) {}

  getGroupId() {
    return "g1";
  }
  getUserId() {
    return "u1";
  }
  getUserName() {
    return "Alice";
  }
  async getRole() {
    return this.role;
  }
  getText() {
    return this.text;
  }
  async deleteMessage() {
    if (this.failDelete) throw new Error("no permission");
    this.deleted++;
  }
  async setBan(durationSeconds: number) {
    if (this.failBan) throw new Error("no permission");
    this.bans.push(durationSeconds);
  }
  async sendGroupNotice(notice: ViolationNotice) {
    if (this.failGroupNotice) throw new Error("chat muted");
    this.groupNotices.push(notice);
  }
  async notifyAdmins(notice: ViolationNotice) {
    if (this.failAdminNotice) throw new Error("no admins reachable");
    this.adminNotices.push(notice);
  }
}
