import type { BackgroundQueue } from "./background-queue";
import type { Clock } from "./clock";
import type { UserDirectory } from "./user-directory";
import type { UserProfile } from "./types";

export class ActivityTracker {
  constructor(
    private readonly directory: UserDirectory,
    private readonly queue: BackgroundQueue,
    private readonly clock: Clock,
  ) {}

  /** Schedules one upsert for the user and returns without waiting for it. */
  track(profile: UserProfile): void {
    const seenAt = this.clock.now();
    this.queue.submit(`track_activity:${profile.userId}`, () => {
      this.directory.upsert(profile, seenAt);
    });
  }
}
