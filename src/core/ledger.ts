import type { ConnectionPool } from "./pool";
import type { SqliteHandle } from "../db/sqlite";
import type { ViolationRecord } from "../types/common";
import { ViolationRowSchema, WordListSchema } from "../types/schemas";
import { errorMessage, StorageCorruptReadError } from "../util/errors";
import { NOOP_LOGGER, type Logger } from "../util/logger";
import { retentionCutoff, violationDay } from "../util/violation-day";

export interface LedgerOptions {
  /** Suspension seconds for tiers 1, 2 and 3+; later tiers reuse the last entry. */
  tierDurations: readonly number[];
  /** Hour (0-23, local time) at which a new violation day starts. */
  resetHour: number;
  retentionDays: number;
  maxTextLength?: number;
  now?: () => number;
  logger?: Logger;
}

export interface RecordViolationInput {
  groupId: string;
  userId: string;
  userName: string;
  words: string[];
  text: string;
  /** Overrides the tier's configured duration, e.g. 0 when auto-ban is off. */
  banDuration?: number;
}

export interface RecordedViolation {
  tier: number;
  banDuration: number;
  violationDay: string;
  record: ViolationRecord;
}

export interface TierReading {
  /** Tier the next violation would land on. */
  tier: number;
  asOfDate: string;
}

const RECORD_COLUMNS = `group_id, user_id, user_name, violation_count, forbidden_words,
  original_text, ban_duration, last_violation_date, created_at`;

/**
 * Durable per-(group, user) escalation state.
 *
 * One row per pair holds the current cycle. A new violation continues the cycle
 * when the stored violation day is today's, and restarts at tier 1 otherwise.
 * Each read-modify-write runs inside one `BEGIN IMMEDIATE` transaction on a
 * single handle, so concurrent violations for a pair cannot both read tier N.
 */
export class ViolationLedger {
  private readonly pool: ConnectionPool<SqliteHandle>;
  private readonly tierDurations: readonly number[];
  private readonly resetHour: number;
  private readonly retentionDays: number;
  private readonly maxTextLength: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(pool: ConnectionPool<SqliteHandle>, opts: LedgerOptions) {
    if (opts.tierDurations.length === 0) throw new RangeError("tierDurations must not be empty");
    this.pool = pool;
    this.tierDurations = opts.tierDurations;
    this.resetHour = opts.resetHour;
    this.retentionDays = opts.retentionDays;
    this.maxTextLength = opts.maxTextLength ?? 500;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? NOOP_LOGGER;
  }

  durationForTier(tier: number): number {
    const idx = Math.min(Math.max(tier, 1), this.tierDurations.length) - 1;
    return this.tierDurations[idx];
  }

  /** Violation day in effect right now. */
  today(): string {
    return violationDay(this.now(), this.resetHour);
  }

  /**
   * Persist a violation and return the tier it landed on. Storage errors
   * (including PoolExhaustedError) propagate; the retention sweep that follows
   * the write is best-effort.
   */
  async recordViolation(input: RecordViolationInput, signal?: AbortSignal): Promise<RecordedViolation> {
    return this.pool.use((db) => {
      const recorded = db.transaction(() => this.upsertNext(db, input)).immediate();
      this.sweep(db);
      return recorded;
    }, signal);
  }

  /**
   * Side-effect free preview of the next tier. Any storage failure yields tier 1
   * and is logged rather than thrown.
   */
  async getCurrentTier(groupId: string, userId: string): Promise<TierReading> {
    const today = this.today();
    try {
      const current = await this.pool.use((db) => this.readCurrent(db, groupId, userId));
      if (current && current.lastViolationDate >= today) {
        return { tier: current.violationCount + 1, asOfDate: current.lastViolationDate };
      }
    } catch (err) {
      this.logger.error("ledger_read_failed", { groupId, userId, error: errorMessage(err) });
    }
    return { tier: 1, asOfDate: today };
  }

  /** Records for a pair, most recent first. Malformed rows are skipped. */
  async listRecords(groupId: string, userId: string): Promise<ViolationRecord[]> {
    return this.pool.use((db) => {
      const rows = db
        .prepare(
          `SELECT ${RECORD_COLUMNS} FROM violations
           WHERE group_id = ? AND user_id = ?
           ORDER BY last_violation_date DESC, created_at DESC`,
        )
        .all(groupId, userId);
      return this.parseRows(rows);
    });
  }

  async listGroupRecords(groupId: string, limit = 20): Promise<ViolationRecord[]> {
    return this.pool.use((db) => {
      const rows = db
        .prepare(
          `SELECT ${RECORD_COLUMNS} FROM violations
           WHERE group_id = ?
           ORDER BY last_violation_date DESC, violation_count DESC
           LIMIT ?`,
        )
        .all(groupId, limit);
      return this.parseRows(rows);
    });
  }

  /** Delete a user's record, or every record in the group. Returns rows removed. */
  async resetRecords(groupId: string, userId?: string): Promise<number> {
    return this.pool.use((db) => {
      const info =
        userId === undefined
          ? db.prepare("DELETE FROM violations WHERE group_id = ?").run(groupId)
          : db.prepare("DELETE FROM violations WHERE group_id = ? AND user_id = ?").run(groupId, userId);
      return info.changes;
    });
  }

  /** Delete every row whose violation day falls before the retention cutoff as of `nowMs`. */
  async purgeExpired(nowMs = this.now()): Promise<number> {
    return this.pool.use((db) => this.deleteExpired(db, nowMs));
  }

  private upsertNext(db: SqliteHandle, input: RecordViolationInput): RecordedViolation {
    const now = this.now();
    const today = violationDay(now, this.resetHour);
    const previous = this.readCurrent(db, input.groupId, input.userId);

    const tier = previous && previous.lastViolationDate >= today ? previous.violationCount + 1 : 1;
    const banDuration = input.banDuration ?? this.durationForTier(tier);

    const record: ViolationRecord = {
      groupId: input.groupId,
      userId: input.userId,
      userName: input.userName,
      violationCount: tier,
      forbiddenWords: input.words,
      originalText: Array.from(input.text).slice(0, this.maxTextLength).join(""),
      banDuration,
      lastViolationDate: today,
      createdAt: now,
    };

    db.prepare(
      `INSERT INTO violations (${RECORD_COLUMNS})
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (group_id, user_id) DO UPDATE SET
         user_name = excluded.user_name,
         violation_count = excluded.violation_count,
         forbidden_words = excluded.forbidden_words,
         original_text = excluded.original_text,
         ban_duration = excluded.ban_duration,
         last_violation_date = excluded.last_violation_date,
         created_at = excluded.created_at`,
    ).run(
      record.groupId,
      record.userId,
      record.userName,
      record.violationCount,
      JSON.stringify(record.forbiddenWords),
      record.originalText,
      record.banDuration,
      record.lastViolationDate,
      record.createdAt,
    );

    return { tier, banDuration, violationDay: today, record };
  }

  /** Most recent record for a pair; a malformed row counts as absent. */
  private readCurrent(db: SqliteHandle, groupId: string, userId: string): ViolationRecord | null {
    const row = db
      .prepare(
        `SELECT ${RECORD_COLUMNS} FROM violations
         WHERE group_id = ? AND user_id = ?
         ORDER BY last_violation_date DESC, created_at DESC
         LIMIT 1`,
      )
      .get(groupId, userId);
    if (row === undefined) return null;

    try {
      return toRecord(row);
    } catch (err) {
      this.logger.warn("ledger_corrupt_row", { groupId, userId, error: errorMessage(err) });
      return null;
    }
  }

  private parseRows(rows: unknown[]): ViolationRecord[] {
    const records: ViolationRecord[] = [];
    for (const row of rows) {
      try {
        records.push(toRecord(row));
      } catch (err) {
        this.logger.warn("ledger_corrupt_row", { error: errorMessage(err) });
      }
    }
    return records;
  }

  private deleteExpired(db: SqliteHandle, nowMs: number): number {
    const cutoff = retentionCutoff(nowMs, this.resetHour, this.retentionDays);
    return db.prepare("DELETE FROM violations WHERE last_violation_date < ?").run(cutoff).changes;
  }

  private sweep(db: SqliteHandle): void {
    try {
      const removed = this.deleteExpired(db, this.now());
      if (removed > 0) this.logger.debug("ledger_retention_sweep", { removed });
    } catch (err) {
      this.logger.error("ledger_retention_sweep_failed", { error: errorMessage(err) });
    }
  }
}

function toRecord(raw: unknown): ViolationRecord {
  const parsed = ViolationRowSchema.safeParse(raw);
  if (!parsed.success) throw new StorageCorruptReadError(parsed.error.issues[0]?.message ?? "unexpected shape");
  const row = parsed.data;

  let words: string[] = [];
  if (row.forbidden_words) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(row.forbidden_words);
    } catch {
      throw new StorageCorruptReadError("forbidden_words is not JSON");
    }
    const list = WordListSchema.safeParse(decoded);
    if (!list.success) throw new StorageCorruptReadError("forbidden_words is not a string list");
    words = list.data;
  }

  return {
    groupId: row.group_id,
    userId: row.user_id,
    userName: row.user_name ?? "",
    violationCount: row.violation_count,
    forbiddenWords: words,
    originalText: row.original_text ?? "",
    banDuration: row.ban_duration ?? 0,
    lastViolationDate: row.last_violation_date,
    createdAt: row.created_at,
  };
}
