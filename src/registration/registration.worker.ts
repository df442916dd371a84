/**
 * Registration Worker
 *
 * Processes one claimed sale day end to end:
 * 1. Resolve the day id on a fresh form page
 * 2. Load the day's sessions and pick the target session
 * 3. Run the captcha attempt loop for each row, in order
 * 4. Release the day exactly once, whatever happened
 *
 * A row that throws is reported and recorded as ERROR; the worker moves on.
 * A full session ends the day and leaves the remaining rows untouched.
 */
import { CaptchaSolver } from "../captcha/captcha-solver";
import { Messenger, notifyOperator } from "../messaging/messenger";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import { ResponseClassifier } from "../site/response.classifier";
import { SiteGatewayFactory } from "../site/site.gateway";
import { UnresolvedDayError } from "../shared/errors/registration.errors";
import {
  DayReleaseOutcome,
  DayResult,
  DayStatus,
  RegistrantRow,
  RowResult,
  Session,
} from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";
import { CaptchaAttemptLoop, rowNumber } from "./captcha-attempt.loop";
import { DayRegistry } from "./day.registry";
import { PendingCaptchaStore } from "./pending-captcha.store";

export interface RegistrationWorkerDeps {
  channelId: string;
  registry: DayRegistry;
  createGateway: SiteGatewayFactory;
  solver: CaptchaSolver | null;
  messenger: Messenger;
  pendingStore: PendingCaptchaStore;
  classify?: ResponseClassifier;
  maxAttempts?: number;
  manualFallbackOnExhaustion?: boolean;
}

/** Day statuses that count as a failed claim when releasing */
const FAILED_DAY_STATUSES: ReadonlySet<DayStatus> = new Set(["FAILED", "UNRESOLVED_DAY"]);

/**
 * The first row (in order) naming an existing session decides the session
 * for the whole day; without a match the day uses its first session.
 */
export function selectSession(sessions: Session[], rows: RegistrantRow[]): Session {
  for (const row of rows) {
    const wanted = row.sessionName?.trim();
    if (!wanted) continue;
    const match = sessions.find((session) => session.label === wanted);
    if (match) return match;
  }
  return sessions[0];
}

export class RegistrationWorker {
  private readonly deps: RegistrationWorkerDeps;

  constructor(deps: RegistrationWorkerDeps) {
    this.deps = deps;
  }

  async run(label: string, rows: RegistrantRow[]): Promise<DayResult> {
    const startedAt = Date.now();
    let releaseOutcome: DayReleaseOutcome = "failed";

    try {
      const result = await this.processDay(label, rows, startedAt);
      releaseOutcome = FAILED_DAY_STATUSES.has(result.status) ? "failed" : "succeeded";
      this.recordDay(result);
      return result;
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ dayLabel: label, error: message }, "Sale day worker failed");
      await this.notify(`❌ [${label}] Day failed: ${message}`);

      const result: DayResult = {
        label,
        status: "FAILED",
        rows: [],
        skippedRows: [],
        error: message,
        durationMs: Date.now() - startedAt,
      };
      this.recordDay(result);
      return result;
    } finally {
      this.deps.registry.release(label, releaseOutcome);
    }
  }

  private async processDay(
    label: string,
    rows: RegistrantRow[],
    startedAt: number
  ): Promise<DayResult> {
    const { registry, createGateway } = this.deps;
    const gateway = createGateway();

    const html = await gateway.fetchFormPage();
    const dayId = gateway.mapLabelToId(html, label);
    if (!dayId) {
      const error = new UnresolvedDayError(label);
      logger.warn({ dayLabel: label }, "Sale day not found on the form");
      await this.notify(`⚠️ [${label}] ${error.message}`);
      return {
        label,
        status: "UNRESOLVED_DAY",
        rows: [],
        skippedRows: [],
        error: error.message,
        durationMs: Date.now() - startedAt,
      };
    }
    registry.recordId(label, dayId);

    const sessions = await gateway.loadSessions(dayId);
    if (sessions.length === 0) {
      await this.notify(`⚠️ [${label}] No sessions open for registration.`);
      return {
        label,
        dayId,
        status: "NO_SESSIONS",
        rows: [],
        skippedRows: [],
        durationMs: Date.now() - startedAt,
      };
    }

    const session = selectSession(sessions, rows);
    logger.info(
      { dayLabel: label, dayId, session: session.label, rows: rows.length },
      "Registering sale day"
    );

    const loop = new CaptchaAttemptLoop({
      gateway,
      createGateway,
      solver: this.deps.solver,
      messenger: this.deps.messenger,
      pendingStore: this.deps.pendingStore,
      classify: this.deps.classify,
      maxAttempts: this.deps.maxAttempts,
      manualFallbackOnExhaustion: this.deps.manualFallbackOnExhaustion,
    });

    const results: RowResult[] = [];
    for (let i = 0; i < rows.length; i++) {
      const row = rows[i];
      const rowResult = await this.runRow(loop, { label, dayId, session, row });
      results.push(rowResult);

      if (rowResult.status === "SESSION_FULL") {
        const skippedRows = rows.slice(i + 1).map((rest) => rest.index);
        await this.notify(
          `⛔ [${label}] Session "${session.label}" is full after row ${rowNumber(row)}; ` +
            `${skippedRows.length} row(s) not attempted.`
        );
        return {
          label,
          dayId,
          session,
          status: "SESSION_FULL",
          rows: results,
          skippedRows,
          durationMs: Date.now() - startedAt,
        };
      }
    }

    return {
      label,
      dayId,
      session,
      status: "COMPLETED",
      rows: results,
      skippedRows: [],
      durationMs: Date.now() - startedAt,
    };
  }

  private async runRow(
    loop: CaptchaAttemptLoop,
    target: { label: string; dayId: string; session: Session; row: RegistrantRow }
  ): Promise<RowResult> {
    try {
      return await loop.run({
        channelId: this.deps.channelId,
        dayLabel: target.label,
        dayId: target.dayId,
        session: target.session,
        row: target.row,
      });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(
        { dayLabel: target.label, rowIndex: target.row.index, error: message },
        "Row failed with an error"
      );
      metrics.increment("registration_rows_total", { status: "error" });
      await this.notify(`❌ [${target.label}] Row ${rowNumber(target.row)} — error: ${message}`);
      return {
        dayLabel: target.label,
        rowIndex: target.row.index,
        status: "ERROR",
        attempts: 0,
        message,
      };
    }
  }

  private recordDay(result: DayResult): void {
    metrics.increment("registration_days_total", { status: result.status.toLowerCase() });
    metrics.recordDuration(result.durationMs / 1000);
    logger.info(
      { dayLabel: result.label, status: result.status, rows: result.rows.length, durationMs: result.durationMs },
      "Sale day finished"
    );
  }

  private notify(text: string): Promise<void> {
    return notifyOperator(this.deps.messenger, this.deps.channelId, text);
  }
}
