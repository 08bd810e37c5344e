/**
 * Dashboard database
 *
 * SQLite store for task records. Uses better-sqlite3 with WAL mode so the
 * REPL and the dashboard can read the same file.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export type DashboardDatabase = Database.Database;

/**
 * Open (or create) the database at `dbPath`. Pass ":memory:" for tests.
 */
export function openDatabase(dbPath: string): DashboardDatabase {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      objective TEXT NOT NULL,
      category TEXT NOT NULL,
      status TEXT NOT NULL,
      total_steps INTEGER NOT NULL DEFAULT 0,
      completed_steps INTEGER NOT NULL DEFAULT 0,
      checkpoint_id TEXT,
      summary TEXT,
      error TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
    CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at);
  `);

  return db;
}
