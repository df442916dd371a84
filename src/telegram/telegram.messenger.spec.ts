import type TelegramBot from "node-telegram-bot-api";
import { chunkText, retryAfterSeconds, TelegramBotLike, TelegramMessenger } from "./telegram.messenger";

function message(id: number): TelegramBot.Message {
  return { message_id: id, date: 0, chat: { id: 7, type: "private" } };
}

function floodError(retryAfter: number): Error {
  return Object.assign(new Error("ETELEGRAM: 429 Too Many Requests"), {
    response: { body: { parameters: { retry_after: retryAfter } } },
  });
}

class FakeBot implements TelegramBotLike {
  readonly messages: Array<{ chatId: TelegramBot.ChatId; text: string }> = [];
  readonly photos: Array<{ chatId: TelegramBot.ChatId; caption: string | undefined }> = [];
  readonly failures: Error[] = [];
  private nextId = 500;

  async sendMessage(chatId: TelegramBot.ChatId, text: string): Promise<TelegramBot.Message> {
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.messages.push({ chatId, text });
    return message(this.nextId++);
  }

  async sendPhoto(
    chatId: TelegramBot.ChatId,
    _photo: unknown,
    options?: TelegramBot.SendPhotoOptions
  ): Promise<TelegramBot.Message> {
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.photos.push({ chatId, caption: options?.caption });
    return message(this.nextId++);
  }
}

describe("chunkText", () => {
  it("should leave a short text whole", () => {
    expect(chunkText("hello", 10)).toEqual(["hello"]);
  });

  it("should cut a long line at the limit", () => {
    expect(chunkText("a".repeat(10), 4)).toEqual(["aaaa", "aaaa", "aa"]);
  });

  it("should prefer a newline late in the chunk", () => {
    expect(chunkText("aaaaaaa\nbbbbbb", 10)).toEqual(["aaaaaaa\n", "bbbbbb"]);
    expect(chunkText("a\nbbbbbbbbbbbb", 10)).toEqual(["a\nbbbbbbbb", "bbbb"]);
  });
});

describe("retryAfterSeconds", () => {
  it("should read the delay of a flood-control reply", () => {
    expect(retryAfterSeconds(floodError(3))).toBe(3);
  });

  it("should ignore other errors", () => {
    expect(retryAfterSeconds(new Error("ETELEGRAM: 400 Bad Request"))).toBeNull();
    expect(retryAfterSeconds("boom")).toBeNull();
  });
});

describe("TelegramMessenger", () => {
  let bot: FakeBot;
  let waits: number[];
  let messenger: TelegramMessenger;

  beforeEach(() => {
    bot = new FakeBot();
    waits = [];
    messenger = new TelegramMessenger(bot, {
      maxMessageLength: 10,
      chunkDelayMs: 5,
      wait: async (ms) => {
        waits.push(ms);
      },
    });
  });

  it("should send a long text in chunks with a pause after each", async () => {
    await messenger.sendText("7", "aaaaaaa\nbbbbbb");

    expect(bot.messages).toEqual([
      { chatId: "7", text: "aaaaaaa\n" },
      { chatId: "7", text: "bbbbbb" },
    ]);
    expect(waits).toEqual([5, 5]);
  });

  it("should return the id of the photo message", async () => {
    const sent = await messenger.sendImage("7", Buffer.from("png"), "[20/12/2026] Row 1");

    expect(sent).toEqual({ messageId: "500" });
    expect(bot.photos).toEqual([{ chatId: "7", caption: "[20/12/2026] Row 1" }]);
  });

  it("should wait out flood control and send once more", async () => {
    bot.failures.push(floodError(2));

    await messenger.sendText("7", "hi");

    expect(waits).toEqual([2000]);
    expect(bot.messages).toEqual([{ chatId: "7", text: "hi" }]);
  });

  it("should pass other errors to the caller", async () => {
    bot.failures.push(new Error("ETELEGRAM: 403 Forbidden"));

    await expect(messenger.sendText("7", "hi")).rejects.toThrow("ETELEGRAM: 403 Forbidden");
  });
});
