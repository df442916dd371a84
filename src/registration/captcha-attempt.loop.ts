/**
 * Captcha Attempt Loop
 *
 * Drives one registrant row to a terminal state:
 *
 *   fresh challenge → solve (or hand to operator) → submit → classify
 *
 * - SUCCESS             stop
 * - SESSION_FULL        stop; the worker ends the day
 * - CAPTCHA_REJECTED    consume an attempt, start over with a new challenge
 * - OTHER_FAILURE       stop without retrying
 * - solver gave nothing consume an attempt
 * - non-retryable error rethrown; the worker records the row as ERROR
 *
 * Without an available solver the row is handed to the operator on the
 * first challenge and the loop returns AWAITING_MANUAL; the answer arrives
 * later through ManualCaptchaResolver.
 */
import config from "../config";
import { CaptchaSolver } from "../captcha/captcha-solver";
import { Messenger, notifyOperator } from "../messaging/messenger";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import { buildRegistrationPayload } from "../site/payload.builder";
import {
  classifySubmissionResponse,
  ResponseClassifier,
} from "../site/response.classifier";
import { SiteGateway, SiteGatewayFactory } from "../site/site.gateway";
import { RegistrationError } from "../shared/errors/registration.errors";
import {
  RegistrantRow,
  RowResult,
  Session,
  SubmissionOutcome,
} from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";
import { PendingCaptchaStore } from "./pending-captcha.store";

export interface RowContext {
  channelId: string;
  dayLabel: string;
  dayId: string;
  session: Session;
  row: RegistrantRow;
}

export interface CaptchaAttemptLoopDeps {
  /** The day's site session, used for automatic attempts */
  gateway: SiteGateway;
  /** Opens a dedicated site session for each challenge handed to the operator */
  createGateway: SiteGatewayFactory;
  solver: CaptchaSolver | null;
  messenger: Messenger;
  pendingStore: PendingCaptchaStore;
  classify?: ResponseClassifier;
  maxAttempts?: number;
  /** Hand an exhausted row to the operator instead of failing it */
  manualFallbackOnExhaustion?: boolean;
}

export interface SubmissionResult {
  outcome: SubmissionOutcome;
  response: string;
}

/**
 * Submit one registration with a captcha answer and classify the reply.
 * Shared by the automatic loop and the operator reply path.
 */
export async function submitAndClassify(
  gateway: SiteGateway,
  classify: ResponseClassifier,
  target: { dayId: string; sessionId: string; row: RegistrantRow },
  answer: string
): Promise<SubmissionResult> {
  const payload = buildRegistrationPayload(target.dayId, target.sessionId, target.row, answer);
  const response = await gateway.submitRegistration(payload);
  return { outcome: classify(response), response };
}

/** Row number as the operator sees it in the spreadsheet */
export function rowNumber(row: RegistrantRow): number {
  return row.index + 1;
}

export class CaptchaAttemptLoop {
  private readonly deps: CaptchaAttemptLoopDeps;
  private readonly classify: ResponseClassifier;
  private readonly maxAttempts: number;

  constructor(deps: CaptchaAttemptLoopDeps) {
    this.deps = deps;
    this.classify = deps.classify ?? classifySubmissionResponse;
    this.maxAttempts = Math.max(1, deps.maxAttempts ?? config.captchaMaxTries);
  }

  async run(ctx: RowContext): Promise<RowResult> {
    const { solver } = this.deps;
    if (!solver || !solver.isAvailable()) {
      return this.handOffToOperator(ctx, 0);
    }

    const n = rowNumber(ctx.row);
    let lastMessage = "";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const logContext = { dayLabel: ctx.dayLabel, rowIndex: ctx.row.index, attempt };

      try {
        // A challenge is single-use on the server side; never reuse one
        const image = await this.fetchChallenge(this.deps.gateway);
        if (!image) {
          metrics.increment("captcha_attempts_total", { result: "no_challenge" });
          await this.report(ctx, `❌ [${ctx.dayLabel}] Row ${n} — captcha challenge unavailable.`);
          return this.finish(ctx, "FAILED", attempt, "Captcha challenge unavailable.");
        }

        const answer = await solver.solve(image);
        if (!answer) {
          lastMessage = `${solver.name} gave no answer (attempt ${attempt}/${this.maxAttempts}).`;
          metrics.increment("captcha_attempts_total", { result: "no_answer" });
          logger.warn(logContext, "Solver gave no answer");
          continue;
        }

        const { outcome, response } = await submitAndClassify(
          this.deps.gateway,
          this.classify,
          { dayId: ctx.dayId, sessionId: ctx.session.id, row: ctx.row },
          answer
        );
        metrics.increment("captcha_attempts_total", { result: outcome.toLowerCase() });
        logger.info({ ...logContext, outcome }, "Registration submitted");

        switch (outcome) {
          case "SUCCESS":
            await this.report(
              ctx,
              `✅ [${ctx.dayLabel}] Row ${n} — registered (attempt ${attempt}/${this.maxAttempts}).`
            );
            return this.finish(ctx, "SUCCESS", attempt);
          case "SESSION_FULL":
            return this.finish(ctx, "SESSION_FULL", attempt, response.slice(0, 200));
          case "CAPTCHA_REJECTED":
            lastMessage = `Captcha rejected by the site (attempt ${attempt}/${this.maxAttempts}).`;
            continue;
          case "OTHER_FAILURE": {
            const message = `Not registered: ${response.slice(0, 200)}`;
            await this.report(ctx, `⚠️ [${ctx.dayLabel}] Row ${n} — ${message}`);
            return this.finish(ctx, "OTHER_FAILURE", attempt, message);
          }
        }
      } catch (error) {
        // A row the site can never accept is not worth another captcha
        if (error instanceof RegistrationError && !error.retryable) throw error;
        lastMessage = `Attempt ${attempt} failed: ${errorMessage(error)}`;
        metrics.increment("captcha_attempts_total", { result: "error" });
        logger.warn({ ...logContext, error: errorMessage(error) }, "Captcha attempt failed");
      }
    }

    if (this.deps.manualFallbackOnExhaustion) {
      logger.info(
        { dayLabel: ctx.dayLabel, rowIndex: ctx.row.index, attempts: this.maxAttempts },
        "Automatic attempts exhausted — handing row to operator"
      );
      return this.handOffToOperator(ctx, this.maxAttempts);
    }

    await this.report(
      ctx,
      `⏭️ [${ctx.dayLabel}] Row ${n} — skipped after ${this.maxAttempts} attempts. ${lastMessage}`.trim()
    );
    return this.finish(ctx, "FAILED", this.maxAttempts, lastMessage);
  }

  /**
   * Publish a fresh challenge to the operator and park the row.
   * Each challenge gets its own site session so that issuing the next row's
   * captcha does not invalidate this one.
   */
  private async handOffToOperator(ctx: RowContext, attemptsUsed: number): Promise<RowResult> {
    const gateway = this.deps.createGateway();
    const image = await this.fetchChallenge(gateway);
    if (!image) {
      await this.report(
        ctx,
        `❌ [${ctx.dayLabel}] Row ${rowNumber(ctx.row)} — could not load a captcha to send.`
      );
      return this.finish(ctx, "FAILED", attemptsUsed, "Captcha challenge unavailable.");
    }

    const caption = `[${ctx.dayLabel}] Row ${rowNumber(ctx.row)}: reply to this message with the captcha code.`;
    const sent = await this.deps.messenger.sendImage(ctx.channelId, image, caption);

    this.deps.pendingStore.put({
      key: { channelId: ctx.channelId, dayLabel: ctx.dayLabel, rowIndex: ctx.row.index },
      dayId: ctx.dayId,
      sessionId: ctx.session.id,
      row: ctx.row,
      gateway,
      image,
      messageId: sent.messageId,
      createdAt: new Date(),
    });

    return this.finish(ctx, "AWAITING_MANUAL", attemptsUsed, "Waiting for operator captcha.");
  }

  private async fetchChallenge(gateway: SiteGateway): Promise<Buffer | null> {
    const ref = await gateway.fetchCaptchaChallengeImageRef();
    if (!ref) return null;
    return gateway.downloadImage(ref);
  }

  private report(ctx: RowContext, text: string): Promise<void> {
    return notifyOperator(this.deps.messenger, ctx.channelId, text);
  }

  private finish(
    ctx: RowContext,
    status: RowResult["status"],
    attempts: number,
    message?: string
  ): RowResult {
    metrics.increment("registration_rows_total", { status: status.toLowerCase() });
    return { dayLabel: ctx.dayLabel, rowIndex: ctx.row.index, status, attempts, message };
  }
}
