import { Bot } from "@maxhub/max-bot-api";

import {
  commandTrigger,
  createCommandHandlers,
  extractUser,
  type BotDependencies,
} from "./bot-handlers";
import { JOIN_CALLBACK_PAYLOAD, buildHelpMessage, buildStartKeyboard } from "./bot-ui";
import { isAdmin, type AppConfig } from "./config";
import { MaxGateway } from "./gateway";
import { t } from "./i18n";
import { normalizeError, type Logger } from "./logger";

export type EngagementBot = {
  start(): void;
  shutdown(): void;
};

export function createEngagementBot(
  config: AppConfig,
  logger: Logger,
  deps: BotDependencies,
): EngagementBot {
  const bot = new Bot(config.botToken);
  const locale = config.defaultLocale;
  const handlers = createCommandHandlers(config, logger, {
    ...deps,
    gateway: new MaxGateway(bot.api),
  });

  void bot.api
    .setMyCommands([
      { name: "start", description: "Start" },
      { name: "join", description: "Join the giveaway" },
      { name: "whoami", description: "Show your user ID" },
    ])
    .catch((error: unknown) => {
      logger.warn("set_commands_failed", normalizeError(error));
    });

  bot.use(async (ctx, next) => {
    handlers.track(ctx);
    return next();
  });

  bot.command(commandTrigger("start"), (ctx) => {
    const user = extractUser(ctx);
    const canManage = user ? isAdmin(config, user.userId) : false;
    return ctx.reply([t(locale, "welcome"), "", buildHelpMessage(locale, canManage)].join("\n"), {
      attachments: [buildStartKeyboard(locale, config.storeUrl)],
    });
  });

  bot.command(commandTrigger("whoami"), (ctx) => handlers.whoami(ctx));
  bot.command(commandTrigger("join"), (ctx) => handlers.join(ctx));
  bot.action(new RegExp(`^${JOIN_CALLBACK_PAYLOAD}$`), (ctx) => handlers.joinButton(ctx));
  bot.command(commandTrigger("participants"), (ctx) => handlers.participants(ctx));
  bot.command(commandTrigger("stats"), (ctx) => handlers.stats(ctx));
  bot.command(commandTrigger("sendall"), (ctx) => handlers.sendall(ctx));

  return {
    start: () => {
      void Promise.resolve(bot.start()).catch((error: unknown) => {
        logger.error("bot_polling_failed", normalizeError(error));
      });
    },
    shutdown: () => {
      bot.stop();
    },
  };
}
