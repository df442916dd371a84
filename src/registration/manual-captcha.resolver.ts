/**
 * Manual Captcha Resolver
 *
 * Inbound half of the human-in-the-loop flow. An operator reply is matched
 * to a pending task, submitted through the site session that issued the
 * challenge, classified and reported back. A wrong answer is not re-prompted:
 * the operator re-sends the roster (or uses /retry) to get a new challenge.
 */
import { Messenger, notifyOperator } from "../messaging/messenger";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import {
  classifySubmissionResponse,
  ResponseClassifier,
} from "../site/response.classifier";
import { PendingTaskKey, SubmissionOutcome } from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";
import { rowNumber, submitAndClassify } from "./captcha-attempt.loop";
import { PendingCaptchaStore, PendingManualTask } from "./pending-captcha.store";

export type ManualReplyResult =
  | { kind: "NO_PENDING_TASK" }
  | { kind: "EMPTY_ANSWER" }
  | { kind: "SUBMITTED"; key: PendingTaskKey; outcome: SubmissionOutcome; response: string }
  | { kind: "SUBMIT_FAILED"; key: PendingTaskKey; error: string };

export interface ManualCaptchaResolverDeps {
  pendingStore: PendingCaptchaStore;
  messenger: Messenger;
  classify?: ResponseClassifier;
}

export class ManualCaptchaResolver {
  private readonly store: PendingCaptchaStore;
  private readonly messenger: Messenger;
  private readonly classify: ResponseClassifier;

  constructor(deps: ManualCaptchaResolverDeps) {
    this.store = deps.pendingStore;
    this.messenger = deps.messenger;
    this.classify = deps.classify ?? classifySubmissionResponse;
  }

  /**
   * Handle a free-text operator message. The replied-to message picks the
   * task; a reply to anything that is not a pending challenge answers
   * nothing. A plain message goes to the channel's oldest pending task.
   */
  async onTextReply(
    channelId: string,
    text: string,
    replyToMessageId?: string | null
  ): Promise<ManualReplyResult> {
    const answer = text.trim();
    if (!answer) return { kind: "EMPTY_ANSWER" };

    const task = replyToMessageId
      ? this.store.popByMessage(channelId, replyToMessageId)
      : this.store.popByChannel(channelId);

    if (!task) {
      logger.debug({ channelId }, "Reply without a pending captcha");
      return { kind: "NO_PENDING_TASK" };
    }
    return this.submit(task, answer);
  }

  /** Answer one specific task; used by the admin API */
  async resolveByKey(key: PendingTaskKey, text: string): Promise<ManualReplyResult> {
    const answer = text.trim();
    if (!answer) return { kind: "EMPTY_ANSWER" };

    const task = this.store.pop(key);
    if (!task) return { kind: "NO_PENDING_TASK" };
    return this.submit(task, answer);
  }

  private async submit(task: PendingManualTask, answer: string): Promise<ManualReplyResult> {
    const { key } = task;
    const prefix = `[${key.dayLabel}] Row ${rowNumber(task.row)}`;

    try {
      const { outcome, response } = await submitAndClassify(
        task.gateway,
        this.classify,
        { dayId: task.dayId, sessionId: task.sessionId, row: task.row },
        answer
      );
      metrics.increment("manual_replies_total", { outcome: outcome.toLowerCase() });
      logger.info({ ...key, outcome }, "Manual captcha submitted");

      await this.report(key.channelId, this.describe(prefix, outcome, response, key.rowIndex));
      return { kind: "SUBMITTED", key, outcome, response };
    } catch (error) {
      const message = errorMessage(error);
      metrics.increment("manual_replies_total", { outcome: "error" });
      logger.error({ ...key, error: message }, "Manual captcha submission failed");

      await this.report(key.channelId, `❌ ${prefix} — submit failed: ${message}`);
      return { kind: "SUBMIT_FAILED", key, error: message };
    }
  }

  private describe(
    prefix: string,
    outcome: SubmissionOutcome,
    response: string,
    rowIndex: number
  ): string {
    switch (outcome) {
      case "SUCCESS":
        return `✅ ${prefix} — registered.`;
      case "CAPTCHA_REJECTED":
        return (
          `❌ ${prefix} — wrong or expired captcha. ` +
          `Send the roster again or use /retry ${rowIndex + 1} for a new challenge.`
        );
      case "SESSION_FULL":
        return `⛔ ${prefix} — session is full: ${response.slice(0, 200)}`;
      case "OTHER_FAILURE":
        return `⚠️ ${prefix} — not registered: ${response.slice(0, 500)}`;
    }
  }

  private report(channelId: string, text: string): Promise<void> {
    return notifyOperator(this.messenger, channelId, text);
  }
}
