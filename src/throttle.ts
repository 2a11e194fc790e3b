import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Runs tasks one at a time, with at least `intervalMs` between the end of one
 * task and the start of the next: a leaky bucket with room for one send.
 * A single instance is shared by every caller that draws on the same rate
 * limit, so overlapping callers are serialized too.
 */
export class Throttle {
  private readonly intervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private lastFinishedAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(intervalMs: number, options: { sleep?: Sleep; now?: () => number } = {}) {
    this.intervalMs = Math.max(0, intervalMs);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    const turn = this.tail.then(async () => {
      await this.waitForSlot();
      try {
        return await task();
      } finally {
        this.lastFinishedAt = this.now();
      }
    });
    // The chain only orders turns; the rejection itself reaches the caller through `turn`.
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastFinishedAt === null || this.intervalMs === 0) {
      return;
    }
    const waitMs = this.lastFinishedAt + this.intervalMs - this.now();
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}
