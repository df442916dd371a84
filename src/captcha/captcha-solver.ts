/**
 * Captcha Solver Contract
 *
 * The attempt loop only needs "image in, answer or nothing out".
 * When no solver is available the loop hands challenges to the operator.
 */
import config from "../config";
import { logger } from "../monitoring/logger";
import { TwoCaptchaClient } from "./twocaptcha.client";

export interface CaptchaSolver {
  /** Human-readable name for logging */
  readonly name: string;
  /** Whether the solver can take work right now (credentials configured) */
  isAvailable(): boolean;
  /**
   * Solve an image captcha.
   * Resolves to null when no answer arrived within the solver's soft timeout.
   */
  solve(image: Buffer): Promise<string | null>;
}

/**
 * Build the solver selected by USE_2CAPTCHA, or null for manual mode.
 */
export function createCaptchaSolver(): CaptchaSolver | null {
  if (!config.useTwoCaptcha) {
    logger.info("Automatic captcha solving disabled — operator will answer captchas");
    return null;
  }

  const client = new TwoCaptchaClient();
  if (!client.isAvailable()) {
    logger.warn("USE_2CAPTCHA=1 but TWO_CAPTCHA_API_KEY is empty — falling back to manual captchas");
    return null;
  }

  logger.info(
    { softTimeoutMs: config.captchaSoftTimeoutMs, pollIntervalMs: config.captchaPollIntervalMs },
    "2Captcha solver enabled"
  );
  return client;
}
