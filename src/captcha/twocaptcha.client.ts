/**
 * 2Captcha API Client
 *
 * Solves the form's image captcha through the 2Captcha service.
 *
 * API docs: https://2captcha.com/2captcha-api
 *
 * Flow:
 * 1. POST to in.php with method=base64 and the image body
 * 2. Receive task ID ({ status: 1, request: taskId })
 * 3. Poll res.php at a fixed interval until the soft timeout
 * 4. Receive the answer ({ status: 1, request: "answer" })
 */
import axios, { AxiosInstance } from "axios";
import config from "../config";
import { logger } from "../monitoring/logger";
import { TwoCaptchaApiError } from "../shared/errors/captcha.errors";
import { errorMessage } from "../shared/utils/errors";
import { sleep } from "../shared/utils/retry";
import { CaptchaSolver } from "./captcha-solver";

const API_BASE = "https://2captcha.com";
const NOT_READY = "CAPCHA_NOT_READY";

interface TwoCaptchaResponse {
  status: number;
  request: string;
  error_text?: string;
}

export interface TwoCaptchaClientOptions {
  apiKey: string;
  softTimeoutMs: number;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  http?: AxiosInstance;
}

export class TwoCaptchaClient implements CaptchaSolver {
  readonly name = "2captcha";
  private readonly options: TwoCaptchaClientOptions;
  private readonly http: AxiosInstance;

  constructor(options: Partial<TwoCaptchaClientOptions> = {}) {
    this.options = {
      apiKey: options.apiKey ?? config.twoCaptchaApiKey,
      softTimeoutMs: options.softTimeoutMs ?? config.captchaSoftTimeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? config.captchaPollIntervalMs,
      requestTimeoutMs: options.requestTimeoutMs ?? config.requestTimeoutMs,
    };
    this.http =
      options.http ??
      axios.create({ baseURL: API_BASE, timeout: this.options.requestTimeoutMs });
  }

  /**
   * Check if the 2Captcha API key is configured.
   */
  isAvailable(): boolean {
    return this.options.apiKey.length > 0;
  }

  /**
   * Submit the image and poll for the answer.
   *
   * Returns the trimmed answer, or null on timeout or an API-level error.
   * @throws TwoCaptchaApiError when the submit request itself fails
   */
  async solve(image: Buffer): Promise<string | null> {
    if (!this.isAvailable()) {
      logger.warn("2Captcha: API key not configured");
      return null;
    }

    let submitData: TwoCaptchaResponse;
    try {
      const body = new URLSearchParams({
        key: this.options.apiKey,
        method: "base64",
        body: image.toString("base64"),
        json: "1",
      });
      const response = await this.http.post<TwoCaptchaResponse>("/in.php", body);
      submitData = response.data;
    } catch (error) {
      const msg = errorMessage(error) || "Unknown error";
      logger.error({ error: msg, imageBytes: image.length }, "2Captcha: image submit failed");
      throw new TwoCaptchaApiError(msg);
    }

    if (submitData.status !== 1 || !submitData.request) {
      this.logApiError(submitData, "image submit");
      return null;
    }

    const taskId = submitData.request;
    logger.info({ taskId }, "2Captcha: image submitted, polling for answer");

    return this.pollResult(taskId);
  }

  /**
   * Poll res.php until an answer arrives or the soft timeout passes.
   * Failed poll requests are logged and polling continues.
   */
  private async pollResult(taskId: string): Promise<string | null> {
    const deadline = Date.now() + this.options.softTimeoutMs;

    while (Date.now() < deadline) {
      await sleep(this.options.pollIntervalMs);

      try {
        const response = await this.http.get<TwoCaptchaResponse>("/res.php", {
          params: {
            key: this.options.apiKey,
            action: "get",
            id: taskId,
            json: 1,
          },
        });
        const data = response.data;

        if (data.status === 1 && data.request) {
          const answer = String(data.request).trim();
          logger.info({ taskId, answerLength: answer.length }, "2Captcha: captcha solved");
          return answer;
        }

        if (data.request === NOT_READY) {
          continue;
        }

        this.logApiError(data, "poll");
        return null;
      } catch (error) {
        logger.warn(
          { taskId, error: errorMessage(error) },
          "2Captcha: poll request failed, retrying"
        );
      }
    }

    logger.warn(
      { taskId, softTimeoutMs: this.options.softTimeoutMs },
      "2Captcha: no answer before soft timeout"
    );
    return null;
  }

  /**
   * Log 2Captcha API errors with context.
   */
  private logApiError(data: TwoCaptchaResponse, context: string): void {
    const errorCode = data.request || data.error_text || "UNKNOWN";

    const errorMessages: Record<string, string> = {
      ERROR_WRONG_USER_KEY: "invalid API key",
      ERROR_KEY_DOES_NOT_EXIST: "API key does not exist",
      ERROR_ZERO_BALANCE: "zero balance — add funds",
      ERROR_NO_SLOT_AVAILABLE: "no workers available, try again later",
      ERROR_CAPTCHA_UNSOLVABLE: "captcha could not be solved",
      ERROR_ZERO_CAPTCHA_FILESIZE: "image is empty",
      ERROR_TOO_BIG_CAPTCHA_FILESIZE: "image is too large",
      ERROR_IMAGE_TYPE_NOT_SUPPORTED: "image type not supported",
      IP_BANNED: "IP address is banned",
    };

    const message = errorMessages[errorCode] || `unknown error: ${errorCode}`;
    logger.warn({ errorCode, response: data }, `2Captcha: ${context} — ${message}`);
  }
}
