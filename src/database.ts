import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

export type SqliteDatabase = Database.Database;

export function openDatabase(storagePath: string): SqliteDatabase {
  if (storagePath !== ":memory:") {
    fs.mkdirSync(path.dirname(storagePath), { recursive: true });
  }
  const db = new Database(storagePath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  ensureSchema(db);
  return db;
}

function ensureSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      user_id INTEGER PRIMARY KEY,
      username TEXT,
      first_name TEXT,
      last_name TEXT,
      joined_at TEXT NOT NULL,
      last_seen TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS users_last_seen_idx ON users (last_seen);

    CREATE TABLE IF NOT EXISTS entries (
      user_id INTEGER PRIMARY KEY,
      username TEXT,
      joined_at TEXT NOT NULL
    );
  `);
}
