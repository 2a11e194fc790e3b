export interface UserProfile {
  userId: number;
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface UserRecord extends UserProfile {
  joinedAt: string;
  lastSeen: string;
}

export interface EntryRecord {
  userId: number;
  username?: string;
  joinedAt: string;
}

export type MembershipStatus =
  | "creator"
  | "administrator"
  | "member"
  | "restricted"
  | "left"
  | "kicked";

export interface BroadcastReport {
  total: number;
  sent: number;
  failed: number;
  durationMs: number;
}
