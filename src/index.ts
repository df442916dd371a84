/**
 * Entry Point: sales-session-registrar
 *
 * Starts the subsystems:
 * 1. Telegram bot: operator channel (rosters in, captchas out), when a
 *    bot token is configured
 * 2. API Server: Express endpoints for health, metrics, runs and captchas
 * 3. Scheduler: node-cron rescan of the form for standing rosters
 *
 * State lives in memory; a restart forgets claimed days and pending
 * captchas.
 */
import TelegramBot from "node-telegram-bot-api";
import { Server } from "node:http";
import config from "./config";
import { startServer } from "./api/server";
import { LoggingMessenger, Messenger } from "./messaging/messenger";
import { checkHealth } from "./monitoring/health.checker";
import { logger } from "./monitoring/logger";
import { startScheduler, stopScheduler } from "./scheduler/scheduler.service";
import { createAppServices } from "./services";
import { errorMessage } from "./shared/utils/errors";
import { startTelegramBot } from "./telegram/telegram.bot";
import { TelegramMessenger } from "./telegram/telegram.messenger";

let bot: TelegramBot | null = null;
let server: Server | null = null;

async function main(): Promise<void> {
  logger.info({ env: config.env, port: config.port }, "Starting sales-session-registrar service");

  // 1. Operator channel
  let messenger: Messenger;
  if (config.telegramBotToken) {
    bot = new TelegramBot(config.telegramBotToken, { polling: true });
    messenger = new TelegramMessenger(bot);
  } else {
    logger.warn("TELEGRAM_BOT_TOKEN not set — operator messages go to the log only");
    messenger = new LoggingMessenger();
  }

  const services = createAppServices({ messenger });

  if (bot) {
    startTelegramBot(bot, {
      service: services.service,
      resolver: services.resolver,
      registry: services.registry,
      pendingStore: services.pendingStore,
      messenger,
      admins: config.admins,
    });
  }

  // 2. Start API server
  server = await startServer({
    ...services,
    health: () =>
      checkHealth({
        siteUrl: config.siteBaseUrl,
        solverConfigured: services.solver !== null,
        telegramEnabled: bot !== null,
      }),
  });

  // 3. Start rescan scheduler
  startScheduler(services.service);

  logger.info("All subsystems started — service is ready");
}

// --- Graceful Shutdown ---
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutdown signal received");

  try {
    stopScheduler();
    if (bot) await bot.stopPolling();
    if (server) {
      const closing = server;
      await new Promise<void>((resolve, reject) =>
        closing.close((error) => (error ? reject(error) : resolve()))
      );
    }
    logger.info("Graceful shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

// Start the service
main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start service");
  process.exit(1);
});
