import type { BackgroundQueue } from "./background-queue";
import { isAdmin, type AppConfig } from "./config";
import { normalizeError, type Logger } from "./logger";
import { Throttle, type Sleep } from "./throttle";
import type { BroadcastReport } from "./types";
import type { UserDirectory } from "./user-directory";

export interface MessageSender {
  sendText(userId: number, text: string): Promise<void>;
}

/** Handle to the operator-facing progress message. */
export interface BroadcastProgress {
  finished(report: BroadcastReport): Promise<void>;
}

export interface BroadcastProgressReporter {
  started(total: number): Promise<BroadcastProgress>;
}

export type BroadcastInput = {
  text: string;
  operatorId: number;
  reporter: BroadcastProgressReporter;
};

export type BroadcastOutcome =
  | { status: "forbidden" }
  | { status: "empty_message" }
  | { status: "no_recipients" }
  | { status: "started"; total: number };

type BroadcastDeps = {
  config: Pick<AppConfig, "adminUserIds" | "broadcastDelayMs">;
  directory: Pick<UserDirectory, "listAllIds">;
  sender: MessageSender;
  queue: Pick<BackgroundQueue, "submit">;
  logger: Logger;
  sleep?: Sleep;
  now?: () => number;
};

/**
 * Admin-only fan-out of one message to every known user. `dispatch` settles
 * once the job is accepted and acknowledged; the sends run on the background
 * queue and the final report is delivered through the progress handle.
 */
export class BroadcastEngine {
  private readonly deps: BroadcastDeps;
  private readonly now: () => number;
  // One pacer for the engine: overlapping jobs share the same send-rate ceiling.
  private readonly throttle: Throttle;

  constructor(deps: BroadcastDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.throttle = new Throttle(deps.config.broadcastDelayMs, {
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
      now: this.now,
    });
  }

  async dispatch(input: BroadcastInput): Promise<BroadcastOutcome> {
    const { config, directory, logger } = this.deps;
    if (!isAdmin(config, input.operatorId)) {
      logger.warn("broadcast_forbidden", { operatorId: input.operatorId });
      return { status: "forbidden" };
    }

    const text = input.text.trim();
    if (!text) {
      return { status: "empty_message" };
    }

    const targetIds = directory.listAllIds();
    if (targetIds.length === 0) {
      logger.info("broadcast_no_recipients", { operatorId: input.operatorId });
      return { status: "no_recipients" };
    }

    const progress = await this.announce(input.reporter, targetIds.length);
    logger.info("broadcast_started", { operatorId: input.operatorId, total: targetIds.length });

    this.deps.queue.submit(`broadcast:${input.operatorId}`, () =>
      this.complete(input.operatorId, text, targetIds, progress),
    );
    return { status: "started", total: targetIds.length };
  }

  private async announce(
    reporter: BroadcastProgressReporter,
    total: number,
  ): Promise<BroadcastProgress | null> {
    try {
      return await reporter.started(total);
    } catch (error) {
      this.deps.logger.warn("broadcast_ack_failed", normalizeError(error));
      return null;
    }
  }

  private async complete(
    operatorId: number,
    text: string,
    targetIds: number[],
    progress: BroadcastProgress | null,
  ): Promise<void> {
    const { logger } = this.deps;
    const report = await this.fanOut(text, targetIds);
    logger.info("broadcast_completed", { operatorId, ...report });

    if (progress) {
      try {
        await progress.finished(report);
      } catch (error) {
        logger.warn("broadcast_report_failed", normalizeError(error));
      }
    }
  }

  // Strictly sequential: the shared throttle is the only thing bounding the send rate.
  private async fanOut(text: string, targetIds: number[]): Promise<BroadcastReport> {
    const { sender, logger } = this.deps;
    const startedAt = this.now();
    let sent = 0;
    let failed = 0;

    for (const userId of targetIds) {
      try {
        await this.throttle.run(() => sender.sendText(userId, text));
        sent += 1;
      } catch (error) {
        failed += 1;
        logger.warn("broadcast_send_failed", { userId, error: normalizeError(error).message });
      }
    }

    return { total: targetIds.length, sent, failed, durationMs: Math.max(0, this.now() - startedAt) };
  }
}
