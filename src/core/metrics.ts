interface Tally {
  total: number;
  bans: number;
}

interface GroupTally extends Tally {
  users: Set<string>;
}

export interface MetricsSnapshot {
  totalChecks: number;
  detected: number;
  autoBans: number;
  unknown: number;
  detectionRate: number;
  byGroup: Record<string, { total: number; bans: number; users: number }>;
  byUser: Record<string, Tally>;
  topWords: Array<{ word: string } & Tally>;
}

/**
 * Process-wide moderation counters. Ephemeral by intent: nothing here is
 * persisted and a restart starts from zero.
 */
export class ModerationMetrics {
  private totalChecks = 0;
  private detected = 0;
  private autoBans = 0;
  private unknown = 0;
  private readonly byGroup = new Map<string, GroupTally>();
  private readonly byUser = new Map<string, Tally>();
  private readonly byWord = new Map<string, Tally>();

  recordCheck(groupId: string, userId: string, words: string[], violated: boolean, banned = false): void {
    this.totalChecks++;
    if (!violated) return;

    this.detected++;
    const ban = banned ? 1 : 0;
    this.autoBans += ban;

    const group = this.byGroup.get(groupId) ?? { total: 0, bans: 0, users: new Set<string>() };
    group.total++;
    group.bans += ban;
    group.users.add(userId);
    this.byGroup.set(groupId, group);

    bump(this.byUser, `${groupId}:${userId}`, ban);
    for (const word of words) bump(this.byWord, word, ban);
  }

  /** A check that ended without a verdict. */
  recordUnknown(): void {
    this.totalChecks++;
    this.unknown++;
  }

  /** A ban applied after the violation was already counted. */
  recordBan(groupId: string, userId: string, words: string[]): void {
    this.autoBans++;
    const group = this.byGroup.get(groupId);
    if (group) group.bans++;
    const user = this.byUser.get(`${groupId}:${userId}`);
    if (user) user.bans++;
    for (const word of words) {
      const tally = this.byWord.get(word);
      if (tally) tally.bans++;
    }
  }

  snapshot(topN = 5): MetricsSnapshot {
    const byGroup: MetricsSnapshot["byGroup"] = {};
    for (const [id, g] of this.byGroup) byGroup[id] = { total: g.total, bans: g.bans, users: g.users.size };

    const byUser: MetricsSnapshot["byUser"] = {};
    for (const [key, t] of this.byUser) byUser[key] = { ...t };

    const topWords = [...this.byWord.entries()]
      .map(([word, t]) => ({ word, ...t }))
      .sort((a, b) => b.total - a.total || a.word.localeCompare(b.word))
      .slice(0, topN);

    return {
      totalChecks: this.totalChecks,
      detected: this.detected,
      autoBans: this.autoBans,
      unknown: this.unknown,
      detectionRate: this.detected / Math.max(this.totalChecks, 1),
      byGroup,
      byUser,
      topWords,
    };
  }

  reset(): void {
    this.totalChecks = 0;
    this.detected = 0;
    this.autoBans = 0;
    this.unknown = 0;
    this.byGroup.clear();
    this.byUser.clear();
    this.byWord.clear();
  }
}

function bump(map: Map<string, Tally>, key: string, ban: number): void {
  const tally = map.get(key) ?? { total: 0, bans: 0 };
  tally.total++;
  tally.bans += ban;
  map.set(key, tally);
}
