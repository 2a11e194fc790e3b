import "dotenv/config";

import { BackgroundQueue } from "./background-queue";
import { createEngagementBot, type EngagementBot } from "./bot";
import { systemClock } from "./clock";
import { loadConfig, type AppConfig } from "./config";
import { openDatabase } from "./database";
import { EntryLedger } from "./entry-ledger";
import { AppLogger, normalizeError } from "./logger";
import { SqliteUserDirectory } from "./user-directory";

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    // Config errors should fail fast before runtime starts.
    console.error("config_load_failed", normalizeError(error));
    process.exit(1);
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = new AppLogger({ logPath: config.logPath, level: config.logLevel });
  const db = openDatabase(config.storagePath);
  const queue = new BackgroundQueue(logger);
  const directory = new SqliteUserDirectory(db);
  const ledger = new EntryLedger(db, config.registryPath, logger);
  const bot: EngagementBot = createEngagementBot(config, logger, {
    directory,
    ledger,
    queue,
    clock: systemClock,
  });
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_started", { reason, exitCode, pendingTasks: queue.size });

    try {
      bot.shutdown();
    } catch (error) {
      logger.error("bot_stop_failed", normalizeError(error));
    }

    const forceExit = setTimeout(() => {
      logger.error("shutdown_forced_exit", { reason });
      process.exit(exitCode);
    }, 5000);
    forceExit.unref();

    queue
      .drain()
      .then(() => {
        db.close();
        clearTimeout(forceExit);
        logger.info("shutdown_completed", { reason, exitCode });
        process.exit(exitCode);
      })
      .catch((error: unknown) => {
        logger.error("repository_close_failed", normalizeError(error));
        process.exit(exitCode);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("uncaughtException", (error) => {
    logger.error("uncaught_exception", normalizeError(error));
    shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("unhandled_rejection", normalizeError(reason));
    shutdown("unhandledRejection", 1);
  });

  bot.start();
  logger.info("bot_started", {
    storagePath: config.storagePath,
    requiredChatId: config.requiredChatId,
    admins: config.adminUserIds.size,
  });
}

main();
