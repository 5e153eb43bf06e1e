import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { ConnectionPool } from "../core/pool";

export type SqliteHandle = Database.Database;

export interface SqlitePoolOptions {
  minSize?: number;
  maxSize?: number;
  acquireTimeoutMs?: number;
  busyTimeoutMs?: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS violations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    group_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    user_name TEXT,
    violation_count INTEGER NOT NULL DEFAULT 1,
    forbidden_words TEXT,
    original_text TEXT,
    ban_duration INTEGER NOT NULL DEFAULT 0,
    last_violation_date TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    UNIQUE (group_id, user_id)
  );
  CREATE INDEX IF NOT EXISTS idx_violations_last_date ON violations (last_violation_date);
`;

export function openSqlite(file: string, busyTimeoutMs = 5_000): SqliteHandle {
  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma(`busy_timeout = ${busyTimeoutMs}`);
  return db;
}

/**
 * Pool of SQLite handles on one database file, schema applied on open.
 * An in-memory database is private to its handle, so ":memory:" gets a pool of one.
 */
export function createSqlitePool(file: string, opts: SqlitePoolOptions = {}): ConnectionPool<SqliteHandle> {
  const inMemory = file === ":memory:";
  if (!inMemory) fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });

  // one handle migrates before the pool opens the rest
  const bootstrap = openSqlite(file, opts.busyTimeoutMs);
  bootstrap.exec(SCHEMA);
  let pending: SqliteHandle | null = bootstrap;

  return new ConnectionPool<SqliteHandle>({
    create: () => {
      if (pending) {
        const first = pending;
        pending = null;
        return first;
      }
      return openSqlite(file, opts.busyTimeoutMs);
    },
    destroy: (db) => db.close(),
    minSize: inMemory ? 1 : Math.max(1, opts.minSize ?? 5),
    maxSize: inMemory ? 1 : opts.maxSize,
    acquireTimeoutMs: opts.acquireTimeoutMs,
  });
}
