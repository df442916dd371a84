/**
 * Telegram Bot
 *
 * Operator channel. Admins upload a roster (.xlsx) to start a run and
 * answer captcha images by replying with the code. Commands:
 *   /start         usage
 *   /status        day and captcha counts
 *   /retry <row>   how to get a new challenge for a row
 */
import axios from "axios";
import TelegramBot from "node-telegram-bot-api";
import config from "../config";
import { Messenger, notifyOperator } from "../messaging/messenger";
import { logger } from "../monitoring/logger";
import { DayRegistry } from "../registration/day.registry";
import { ManualCaptchaResolver } from "../registration/manual-captcha.resolver";
import { PendingCaptchaStore } from "../registration/pending-captcha.store";
import { RegistrationService } from "../registration/registration.service";
import { parseRoster } from "../roster/roster.parser";
import { RosterFormatError } from "../shared/errors/registration.errors";
import { RegistrantRow } from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";

export interface TelegramBotDeps {
  service: RegistrationService;
  resolver: ManualCaptchaResolver;
  registry: DayRegistry;
  pendingStore: PendingCaptchaStore;
  messenger: Messenger;
  /** Telegram user ids allowed to operate the bot; empty admits everyone */
  admins: string[];
  downloadFile: (fileId: string) => Promise<Buffer>;
}

export interface TelegramHandlers {
  onStart(msg: TelegramBot.Message): Promise<void>;
  onStatus(msg: TelegramBot.Message): Promise<void>;
  onRetry(msg: TelegramBot.Message, argument: string | undefined): Promise<void>;
  onDocument(msg: TelegramBot.Message): Promise<void>;
  onText(msg: TelegramBot.Message): Promise<void>;
}

const USAGE = [
  "Send the roster as an .xlsx file to start registering.",
  "Columns: FullName, DOB_Day, DOB_Month, DOB_Year, Phone, Email, IDNumber (SessionName optional).",
  "When a captcha image arrives, reply to it with the code.",
  "/status shows progress.",
].join("\n");

export function createTelegramHandlers(deps: TelegramBotDeps): TelegramHandlers {
  const channelOf = (msg: TelegramBot.Message): string => String(msg.chat.id);
  const reply = (msg: TelegramBot.Message, text: string): Promise<void> =>
    notifyOperator(deps.messenger, channelOf(msg), text);

  const isAdmin = (msg: TelegramBot.Message): boolean =>
    deps.admins.length === 0 ||
    (msg.from !== undefined && deps.admins.includes(String(msg.from.id)));

  /** Run the handler for admins; everyone else is logged and ignored */
  const adminOnly = async (
    msg: TelegramBot.Message,
    handler: () => Promise<void>
  ): Promise<void> => {
    if (!isAdmin(msg)) {
      logger.warn({ userId: msg.from?.id, chatId: msg.chat.id }, "Ignoring Telegram message from non-admin");
      return;
    }
    await handler();
  };

  return {
    onStart: (msg) => adminOnly(msg, () => reply(msg, USAGE)),

    onStatus: (msg) =>
      adminOnly(msg, async () => {
        const days = deps.registry.snapshot();
        const count = (state: string): number => days.filter((day) => day.state === state).length;
        await reply(
          msg,
          [
            `Sale days: ${count("ACTIVE")} active, ${count("COMPLETED")} done, ${count("PENDING")} waiting.`,
            `Captchas waiting for you: ${deps.pendingStore.countByChannel(channelOf(msg))}.`,
          ].join("\n")
        );
      }),

    onRetry: (msg, argument) =>
      adminOnly(msg, async () => {
        const row = Number.parseInt(argument ?? "", 10);
        if (!Number.isInteger(row) || row < 1) {
          await reply(msg, "Usage: /retry <row number>");
          return;
        }
        await reply(
          msg,
          `Row ${row}: send the roster file again; every unfinished row gets a new captcha.`
        );
      }),

    onDocument: (msg) =>
      adminOnly(msg, async () => {
        const document = msg.document;
        if (!document) return;

        if (!document.file_name?.toLowerCase().endsWith(".xlsx")) {
          await reply(msg, "Please send the roster as an .xlsx file.");
          return;
        }

        let rows: RegistrantRow[];
        try {
          rows = await parseRoster(await deps.downloadFile(document.file_id));
        } catch (error) {
          if (error instanceof RosterFormatError) {
            await reply(msg, ["Roster rejected:", ...error.problems.map((p) => `• ${p}`)].join("\n"));
            return;
          }
          throw error;
        }

        try {
          await deps.service.startRun(channelOf(msg), rows);
        } catch (error) {
          logger.error({ chatId: msg.chat.id, error: errorMessage(error) }, "Could not start run");
          await reply(msg, `Could not read the sale days from the form: ${errorMessage(error)}`);
        }
      }),

    onText: async (msg) => {
      const text = msg.text;
      if (!text || text.startsWith("/")) return;

      await adminOnly(msg, async () => {
        const replyTo = msg.reply_to_message ? String(msg.reply_to_message.message_id) : null;
        const result = await deps.resolver.onTextReply(channelOf(msg), text, replyTo);
        if (result.kind === "NO_PENDING_TASK") {
          await reply(msg, "No captcha is waiting for an answer.");
        }
      });
    },
  };
}

/** Wire handlers to a polling bot; handler failures are logged */
export function attachTelegramHandlers(bot: TelegramBot, handlers: TelegramHandlers): void {
  const guard =
    (name: string, handler: (msg: TelegramBot.Message) => Promise<void>) =>
    (msg: TelegramBot.Message): void => {
      handler(msg).catch((error: unknown) => {
        logger.error({ handler: name, chatId: msg.chat.id, error: errorMessage(error) }, "Telegram handler failed");
      });
    };

  bot.onText(/^\/start\b/, guard("start", handlers.onStart));
  bot.onText(/^\/status\b/, guard("status", handlers.onStatus));
  bot.onText(/^\/retry(?:\s+(\S+))?/, (msg, match) =>
    guard("retry", (m) => handlers.onRetry(m, match?.[1]))(msg)
  );
  bot.on("document", guard("document", handlers.onDocument));
  bot.on("text", guard("text", handlers.onText));
  bot.on("polling_error", (error) => {
    logger.error({ error: error.message }, "Telegram polling error");
  });
}

/** Start a polling bot bound to the registration services */
export function startTelegramBot(
  bot: TelegramBot,
  deps: Omit<TelegramBotDeps, "downloadFile">
): void {
  const handlers = createTelegramHandlers({
    ...deps,
    downloadFile: async (fileId) => {
      const link = await bot.getFileLink(fileId);
      const response = await axios.get<ArrayBuffer>(link, {
        responseType: "arraybuffer",
        timeout: config.requestTimeoutMs,
      });
      return Buffer.from(response.data);
    },
  });

  attachTelegramHandlers(bot, handlers);
  logger.info({ admins: deps.admins.length }, "Telegram bot listening");
}
