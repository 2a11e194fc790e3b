import type { SqliteDatabase } from "./database";
import { withStorageError } from "./errors";
import type { UserProfile, UserRecord } from "./types";

/**
 * Durable set of every user the bot has seen. One row per user id.
 */
export interface UserDirectory {
  /**
   * Inserts the user with `joinedAt = lastSeen = at`, or refreshes the profile
   * fields and `lastSeen` of an existing row. `joinedAt` is never touched after
   * the first insert and `lastSeen` never moves backward.
   */
  upsert(profile: UserProfile, at: Date): void;
  get(userId: number): UserRecord | undefined;
  countTotal(): number;
  countActiveSince(threshold: Date): number;
  /** Snapshot of all ids, oldest users first. */
  listAllIds(): number[];
}

type UserRow = {
  user_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  joined_at: string;
  last_seen: string;
};

type UpsertParams = {
  userId: number;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  at: string;
};

function toUserRecord(row: UserRow): UserRecord {
  return {
    userId: row.user_id,
    joinedAt: row.joined_at,
    lastSeen: row.last_seen,
    ...(row.username ? { username: row.username } : {}),
    ...(row.first_name ? { firstName: row.first_name } : {}),
    ...(row.last_name ? { lastName: row.last_name } : {}),
  };
}

function emptyToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export class SqliteUserDirectory implements UserDirectory {
  private readonly db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.db = db;
  }

  upsert(profile: UserProfile, at: Date): void {
    withStorageError("users.upsert", () => {
      this.db
        .prepare<UpsertParams>(
          `INSERT INTO users (user_id, username, first_name, last_name, joined_at, last_seen)
           VALUES (@userId, @username, @firstName, @lastName, @at, @at)
           ON CONFLICT(user_id) DO UPDATE SET
             username = excluded.username,
             first_name = excluded.first_name,
             last_name = excluded.last_name,
             last_seen = MAX(users.last_seen, excluded.last_seen)`,
        )
        .run({
          userId: profile.userId,
          username: emptyToNull(profile.username),
          firstName: emptyToNull(profile.firstName),
          lastName: emptyToNull(profile.lastName),
          at: at.toISOString(),
        });
    });
  }

  get(userId: number): UserRecord | undefined {
    const row = withStorageError("users.get", () =>
      this.db.prepare<[number], UserRow>("SELECT * FROM users WHERE user_id = ?").get(userId),
    );
    return row ? toUserRecord(row) : undefined;
  }

  countTotal(): number {
    return withStorageError("users.countTotal", () => {
      const row = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM users").get();
      return row?.total ?? 0;
    });
  }

  countActiveSince(threshold: Date): number {
    return withStorageError("users.countActiveSince", () => {
      const row = this.db
        .prepare<[string], { total: number }>(
          "SELECT COUNT(*) AS total FROM users WHERE last_seen >= ?",
        )
        .get(threshold.toISOString());
      return row?.total ?? 0;
    });
  }

  listAllIds(): number[] {
    return withStorageError("users.listAllIds", () =>
      this.db
        .prepare<[], { user_id: number }>("SELECT user_id FROM users ORDER BY joined_at ASC, user_id ASC")
        .all()
        .map((row) => row.user_id),
    );
  }
}
