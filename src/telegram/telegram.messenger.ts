/**
 * Telegram Messenger
 *
 * Messenger over the Telegram Bot API. Long texts are split below
 * Telegram's message limit; a flood-control reply (retry_after) is waited
 * out and the chunk is sent once more.
 */
import type TelegramBot from "node-telegram-bot-api";
import { TELEGRAM } from "../config/constants";
import { Messenger, SentMessage } from "../messaging/messenger";
import { logger } from "../monitoring/logger";
import { sleep } from "../shared/utils/retry";

/** The bot methods this module calls */
export type TelegramBotLike = Pick<TelegramBot, "sendMessage" | "sendPhoto">;

export interface TelegramMessengerOptions {
  maxMessageLength?: number;
  chunkDelayMs?: number;
  wait?: (ms: number) => Promise<void>;
}

/** Split on a newline where one falls late enough in the chunk */
export function chunkText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);
    if (end < text.length) {
      const lastNewline = text.slice(start, end).lastIndexOf("\n");
      if (lastNewline > Math.floor(maxLength * 0.6)) end = start + lastNewline + 1;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

/** Seconds Telegram asked us to wait, if the error is a flood-control reply */
export function retryAfterSeconds(error: unknown): number | null {
  let current: unknown = error;
  for (const key of ["response", "body", "parameters", "retry_after"]) {
    if (typeof current !== "object" || current === null) return null;
    current = Reflect.get(current, key);
  }
  return typeof current === "number" && current > 0 ? current : null;
}

export class TelegramMessenger implements Messenger {
  private readonly bot: TelegramBotLike;
  private readonly maxMessageLength: number;
  private readonly chunkDelayMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(bot: TelegramBotLike, options: TelegramMessengerOptions = {}) {
    this.bot = bot;
    this.maxMessageLength = options.maxMessageLength ?? TELEGRAM.MAX_MESSAGE_LENGTH;
    this.chunkDelayMs = options.chunkDelayMs ?? TELEGRAM.CHUNK_DELAY_MS;
    this.wait = options.wait ?? sleep;
  }

  async sendText(channelId: string, text: string): Promise<void> {
    const chunks = chunkText(text, this.maxMessageLength);

    for (const chunk of chunks) {
      await this.withFloodControl(() =>
        this.bot.sendMessage(channelId, chunk, { disable_web_page_preview: true })
      );
      if (chunks.length > 1) await this.wait(this.chunkDelayMs);
    }
  }

  async sendImage(channelId: string, image: Buffer, caption: string): Promise<SentMessage> {
    const sent = await this.withFloodControl(() =>
      this.bot.sendPhoto(
        channelId,
        image,
        { caption },
        { filename: "captcha.png", contentType: "image/png" }
      )
    );
    return { messageId: String(sent.message_id) };
  }

  private async withFloodControl<T>(send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      const retryAfter = retryAfterSeconds(error);
      if (retryAfter === null) throw error;

      logger.warn({ retryAfter }, "Telegram flood control — waiting before resending");
      await this.wait(retryAfter * 1000);
      return send();
    }
  }
}
