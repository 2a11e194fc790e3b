import { ActivityTracker } from "./activity-tracker";
import type { BackgroundQueue } from "./background-queue";
import { describeGateOutcome, formatBroadcastReport, formatParticipants } from "./bot-ui";
import { BroadcastEngine, type BroadcastProgressReporter, type MessageSender } from "./broadcast";
import { startOfUtcDay, type Clock } from "./clock";
import { isAdmin, type AppConfig } from "./config";
import type { EntryLedger } from "./entry-ledger";
import { extractMessageId, type MaxGateway } from "./gateway";
import { t, type SupportedLocale } from "./i18n";
import { normalizeError, type Logger } from "./logger";
import { MembershipGate, type MembershipOracle } from "./membership-gate";
import type { UserProfile } from "./types";
import type { UserDirectory } from "./user-directory";

export type BotDependencies = {
  directory: UserDirectory;
  ledger: EntryLedger;
  queue: BackgroundQueue;
  clock: Clock;
};

export type BotGateway = MessageSender & MembershipOracle & Pick<MaxGateway, "editText">;

export interface ReplyContext {
  reply(text: string): Promise<unknown>;
}

export interface CallbackContext {
  answerOnCallback(extra: { notification: string }): Promise<unknown>;
}

export type CommandHandlers = {
  track(ctx: unknown): void;
  whoami(ctx: ReplyContext): Promise<void>;
  join(ctx: ReplyContext): Promise<void>;
  joinButton(ctx: CallbackContext): Promise<void>;
  participants(ctx: ReplyContext): Promise<void>;
  stats(ctx: ReplyContext): Promise<void>;
  sendall(ctx: ReplyContext): Promise<void>;
};

/**
 * Trigger for `/name`, with or without text after it. The SDK matches a plain
 * string command only when the message is exactly `/name`.
 */
export function commandTrigger(name: string): RegExp {
  return new RegExp(`^${name}(?:\\s[\\s\\S]*)?$`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readOptionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function toProfile(raw: unknown): UserProfile | null {
  if (!isRecord(raw)) {
    return null;
  }
  const userId = Number(raw.user_id ?? raw.userId ?? raw.id);
  if (!Number.isSafeInteger(userId) || userId === 0) {
    return null;
  }
  const username = readOptionalString(raw, "username");
  const firstName = readOptionalString(raw, "first_name") ?? readOptionalString(raw, "name");
  const lastName = readOptionalString(raw, "last_name");
  return {
    userId,
    ...(username ? { username } : {}),
    ...(firstName ? { firstName } : {}),
    ...(lastName ? { lastName } : {}),
  };
}

export function extractUser(ctx: unknown): UserProfile | null {
  if (!isRecord(ctx)) {
    return null;
  }
  const userField = ctx.user;
  const direct = typeof userField === "function" ? toProfile(userField.call(ctx)) : toProfile(userField);
  if (direct) {
    return direct;
  }
  const update = ctx.update;
  if (!isRecord(update)) {
    return null;
  }
  if (isRecord(update.callback)) {
    const fromCallback = toProfile(update.callback.user);
    if (fromCallback) {
      return fromCallback;
    }
  }
  if (isRecord(update.message)) {
    const fromMessage = toProfile(update.message.sender);
    if (fromMessage) {
      return fromMessage;
    }
  }
  return toProfile(update.user) ?? toProfile(update.sender);
}

function extractText(ctx: unknown): string {
  if (!isRecord(ctx)) {
    return "";
  }
  const messages = [ctx.message, isRecord(ctx.update) ? ctx.update.message : undefined];
  for (const message of messages) {
    if (!isRecord(message)) {
      continue;
    }
    const body = message.body;
    if (isRecord(body) && typeof body.text === "string") {
      return body.text.trim();
    }
    if (typeof message.text === "string") {
      return message.text.trim();
    }
  }
  return "";
}

function parseCommandArgs(fullText: string): string {
  return fullText.replace(/^\/\S*\s*/, "").trim();
}

function createProgressReporter(
  locale: SupportedLocale,
  reply: (text: string) => Promise<unknown>,
  gateway: Pick<MaxGateway, "editText">,
): BroadcastProgressReporter {
  return {
    started: async (total) => {
      const message = await reply(t(locale, "broadcastStarted", { total }));
      const messageId = extractMessageId(message);
      return {
        finished: async (report) => {
          const text = formatBroadcastReport(locale, report);
          if (messageId) {
            await gateway.editText(messageId, text);
            return;
          }
          await reply(text);
        },
      };
    },
  };
}

export function createCommandHandlers(
  config: AppConfig,
  logger: Logger,
  deps: BotDependencies & { gateway: BotGateway },
): CommandHandlers {
  const locale = config.defaultLocale;
  const { gateway } = deps;
  const tracker = new ActivityTracker(deps.directory, deps.queue, deps.clock);
  const gate = new MembershipGate({
    requiredChatId: config.requiredChatId,
    oracle: gateway,
    ledger: deps.ledger,
    clock: deps.clock,
    logger,
  });
  const broadcaster = new BroadcastEngine({
    config,
    directory: deps.directory,
    sender: gateway,
    queue: deps.queue,
    logger,
  });

  const adminOf = (ctx: unknown): UserProfile | null => {
    const user = extractUser(ctx);
    return user && isAdmin(config, user.userId) ? user : null;
  };

  return {
    track: (ctx) => {
      const user = extractUser(ctx);
      if (user) {
        tracker.track(user);
      }
    },

    whoami: async (ctx) => {
      const user = extractUser(ctx);
      await ctx.reply(user ? t(locale, "whoami", { userId: user.userId }) : t(locale, "userNotDetected"));
    },

    join: async (ctx) => {
      const user = extractUser(ctx);
      if (!user) {
        await ctx.reply(t(locale, "userNotDetected"));
        return;
      }
      let text: string;
      try {
        text = describeGateOutcome(locale, await gate.enter(user));
      } catch (error) {
        logger.error("join_failed", { userId: user.userId, ...normalizeError(error) });
        text = t(locale, "genericFailure");
      }
      await ctx.reply(text);
    },

    joinButton: async (ctx) => {
      const user = extractUser(ctx);
      if (!user) {
        await ctx.answerOnCallback({ notification: t(locale, "userNotDetected") });
        return;
      }
      let notification: string;
      try {
        notification = describeGateOutcome(locale, await gate.enter(user));
      } catch (error) {
        logger.error("join_failed", { userId: user.userId, ...normalizeError(error) });
        notification = t(locale, "genericFailure");
      }
      await ctx.answerOnCallback({ notification });
    },

    participants: async (ctx) => {
      if (!adminOf(ctx)) {
        return;
      }
      let text: string;
      try {
        text = formatParticipants(locale, deps.ledger.listEntries());
      } catch (error) {
        logger.error("participants_failed", normalizeError(error));
        text = t(locale, "genericFailure");
      }
      await ctx.reply(text);
    },

    stats: async (ctx) => {
      if (!adminOf(ctx)) {
        return;
      }
      let text: string;
      try {
        const today = startOfUtcDay(deps.clock.now());
        text = t(locale, "stats", {
          total: deps.directory.countTotal(),
          activeToday: deps.directory.countActiveSince(today),
          entries: deps.ledger.countEntries(),
        });
      } catch (error) {
        logger.error("stats_failed", normalizeError(error));
        text = t(locale, "genericFailure");
      }
      await ctx.reply(text);
    },

    // Returns once the job is acknowledged; the sends continue on the background queue.
    sendall: async (ctx) => {
      const user = extractUser(ctx);
      if (!user) {
        return;
      }
      const reporter = createProgressReporter(locale, (text) => ctx.reply(text), gateway);
      try {
        const outcome = await broadcaster.dispatch({
          text: parseCommandArgs(extractText(ctx)),
          operatorId: user.userId,
          reporter,
        });
        if (outcome.status === "empty_message") {
          await ctx.reply(t(locale, "broadcastUsage"));
        } else if (outcome.status === "no_recipients") {
          await ctx.reply(t(locale, "broadcastNoRecipients"));
        }
      } catch (error) {
        logger.error("broadcast_failed", { operatorId: user.userId, ...normalizeError(error) });
        await ctx.reply(t(locale, "genericFailure"));
      }
    },
  };
}

export const __testables = {
  extractUser,
  extractText,
  parseCommandArgs,
  createProgressReporter,
};
