/**
 * Messenger Contract
 *
 * Outbound side of the operator channel. The Telegram bot implements it in
 * production; runs started from the admin API without a bot use the
 * logging implementation below.
 */
import { logger } from "../monitoring/logger";
import { errorMessage } from "../shared/utils/errors";

export interface SentMessage {
  /** Transport id of the delivered message, used for reply-to routing */
  messageId: string | null;
}

export interface Messenger {
  sendText(channelId: string, text: string): Promise<void>;
  sendImage(channelId: string, image: Buffer, caption: string): Promise<SentMessage>;
}

/**
 * Writes every message to the log. Captcha images stay reachable through
 * GET /captchas/image and are answered with POST /captchas/answer.
 */
export class LoggingMessenger implements Messenger {
  async sendText(channelId: string, text: string): Promise<void> {
    logger.info({ channelId, text }, "Operator message");
  }

  async sendImage(channelId: string, image: Buffer, caption: string): Promise<SentMessage> {
    logger.info({ channelId, caption, imageBytes: image.length }, "Operator captcha image");
    return { messageId: null };
  }
}

/**
 * Deliver a status line to the operator. A delivery failure is logged and
 * does not interrupt the registration that produced the message.
 */
export async function notifyOperator(
  messenger: Messenger,
  channelId: string,
  text: string
): Promise<void> {
  try {
    await messenger.sendText(channelId, text);
  } catch (error) {
    logger.error(
      { channelId, error: errorMessage(error) },
      "Failed to deliver operator message"
    );
  }
}
