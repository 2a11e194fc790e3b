import fs from "node:fs";
import path from "node:path";

import type { SqliteDatabase } from "./database";
import { withStorageError } from "./errors";
import { normalizeError, type Logger } from "./logger";
import type { EntryRecord, UserProfile } from "./types";

type EntryRow = {
  user_id: number;
  username: string | null;
  joined_at: string;
};

export type RecordEntryResult = {
  entry: EntryRecord;
  created: boolean;
};

function toEntryRecord(row: EntryRow): EntryRecord {
  return {
    userId: row.user_id,
    joinedAt: row.joined_at,
    ...(row.username ? { username: row.username } : {}),
  };
}

/**
 * Giveaway participants. The `entries` table is the authority; the registry
 * file is an append-only list of usernames kept for people who read it by hand
 * and may miss users without a public username.
 */
export class EntryLedger {
  private readonly db: SqliteDatabase;
  private readonly registryPath: string;
  private readonly logger: Logger;

  constructor(db: SqliteDatabase, registryPath: string, logger: Logger) {
    this.db = db;
    this.registryPath = registryPath;
    this.logger = logger;
    fs.mkdirSync(path.dirname(this.registryPath), { recursive: true });
  }

  record(user: UserProfile, at: Date): RecordEntryResult {
    const username = user.username?.trim() ?? "";
    const { entry, created } = withStorageError("entries.record", () => {
      const result = this.db
        .prepare<[number, string | null, string]>(
          "INSERT INTO entries (user_id, username, joined_at) VALUES (?, ?, ?) ON CONFLICT(user_id) DO NOTHING",
        )
        .run(user.userId, username || null, at.toISOString());
      const row = this.db
        .prepare<[number], EntryRow>("SELECT user_id, username, joined_at FROM entries WHERE user_id = ?")
        .get(user.userId);
      if (!row) {
        throw new Error(`entry for user ${user.userId} is missing after insert`);
      }
      return { entry: toEntryRecord(row), created: result.changes > 0 };
    });

    if (username) {
      this.appendToRegistry(username);
    }
    return { entry, created };
  }

  listEntries(): EntryRecord[] {
    return withStorageError("entries.list", () =>
      this.db
        .prepare<[], EntryRow>("SELECT user_id, username, joined_at FROM entries ORDER BY joined_at ASC, user_id ASC")
        .all()
        .map(toEntryRecord),
    );
  }

  countEntries(): number {
    return withStorageError("entries.count", () => {
      const row = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM entries").get();
      return row?.total ?? 0;
    });
  }

  readRegistry(): string[] {
    if (!fs.existsSync(this.registryPath)) {
      return [];
    }
    return fs
      .readFileSync(this.registryPath, "utf8")
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  private appendToRegistry(username: string): void {
    try {
      if (this.readRegistry().includes(username)) {
        return;
      }
      fs.appendFileSync(this.registryPath, `${username}\n`, "utf8");
    } catch (error) {
      this.logger.warn("registry_append_failed", {
        registryPath: this.registryPath,
        username,
        ...normalizeError(error),
      });
    }
  }
}
