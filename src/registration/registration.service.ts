/**
 * Registration Service
 *
 * Entry point for a roster: scrape the sale days, build the assignment,
 * dispatch one worker per claimable day and report the run's outcome to
 * the operator channel. Keeps the most recent runs of this process in
 * memory and the latest roster of each channel for periodic rescans.
 */
import { v4 as uuidv4 } from "uuid";
import config from "../config";
import { CaptchaSolver } from "../captcha/captcha-solver";
import { Messenger, notifyOperator } from "../messaging/messenger";
import { logger } from "../monitoring/logger";
import { ResponseClassifier } from "../site/response.classifier";
import { SiteGatewayFactory } from "../site/site.gateway";
import {
  AssignmentMode,
  DayResult,
  RegistrantRow,
} from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";
import { buildAssignment } from "./assignment";
import { DayScheduler, DayWorkerEntry } from "./day.scheduler";
import { DayRegistry } from "./day.registry";
import { PendingCaptchaStore } from "./pending-captcha.store";
import { RegistrationWorker } from "./registration.worker";

export type RunTrigger = "roster" | "rescan";

export interface RegistrationRun {
  id: string;
  channelId: string;
  trigger: RunTrigger;
  startedAt: Date;
  finishedAt?: Date;
  /** Sale day labels found on the form */
  days: string[];
  claimed: string[];
  skipped: string[];
  results?: DayResult[];
}

export interface StartedRun {
  run: RegistrationRun;
  /** Resolves once every claimed day has finished */
  completion: Promise<RegistrationRun>;
}

export interface RegistrationServiceDeps {
  registry: DayRegistry;
  scheduler: DayScheduler;
  pendingStore: PendingCaptchaStore;
  messenger: Messenger;
  solver: CaptchaSolver | null;
  createGateway: SiteGatewayFactory;
  classify?: ResponseClassifier;
  assignmentMode?: AssignmentMode;
  maxAttempts?: number;
  manualFallbackOnExhaustion?: boolean;
  /** Oldest runs are dropped past this many */
  maxRecordedRuns?: number;
}

export class RegistrationService {
  private readonly deps: RegistrationServiceDeps;
  private readonly assignmentMode: AssignmentMode;
  private readonly maxRecordedRuns: number;
  private readonly runs = new Map<string, RegistrationRun>();
  private readonly rosters = new Map<string, RegistrantRow[]>();

  constructor(deps: RegistrationServiceDeps) {
    this.deps = deps;
    this.assignmentMode = deps.assignmentMode ?? config.assignmentMode;
    this.maxRecordedRuns = Math.max(1, deps.maxRecordedRuns ?? config.maxRecordedRuns);
  }

  /**
   * Start registering a roster for a channel. Resolves as soon as the
   * workers are dispatched; a site failure while scraping the sale days
   * rejects.
   */
  async startRun(channelId: string, rows: RegistrantRow[]): Promise<StartedRun> {
    this.rosters.set(channelId, rows);
    return this.dispatchRoster(channelId, rows, "roster");
  }

  /**
   * Re-read the form for every channel's latest roster and dispatch the
   * days nobody has claimed yet. Returns how many days were dispatched.
   */
  async rescan(): Promise<number> {
    let dispatched = 0;

    for (const [channelId, rows] of this.rosters) {
      try {
        const { run } = await this.dispatchRoster(channelId, rows, "rescan");
        dispatched += run.claimed.length;
      } catch (error) {
        logger.error({ channelId, error: errorMessage(error) }, "Rescan failed for channel");
      }
    }
    return dispatched;
  }

  getRun(id: string): RegistrationRun | null {
    return this.runs.get(id) ?? null;
  }

  listRuns(): RegistrationRun[] {
    return Array.from(this.runs.values());
  }

  /** Channels holding a roster for rescans */
  rosterChannels(): string[] {
    return Array.from(this.rosters.keys());
  }

  private recordRun(run: RegistrationRun): void {
    this.runs.set(run.id, run);
    for (const id of this.runs.keys()) {
      if (this.runs.size <= this.maxRecordedRuns) break;
      this.runs.delete(id);
    }
  }

  private async dispatchRoster(
    channelId: string,
    rows: RegistrantRow[],
    trigger: RunTrigger
  ): Promise<StartedRun> {
    const gateway = this.deps.createGateway();
    const html = await gateway.fetchFormPage();
    const days = gateway.extractSalesDayLabels(html);

    const assignment = buildAssignment(days, rows, this.assignmentMode);
    const handle = this.deps.scheduler.dispatch(assignment, this.workerEntry(channelId));

    const run: RegistrationRun = {
      id: uuidv4(),
      channelId,
      trigger,
      startedAt: new Date(),
      days,
      claimed: handle.claimed,
      skipped: handle.skipped,
    };

    // A rescan that found nothing new stays silent and is not recorded
    if (trigger === "rescan" && run.claimed.length === 0) {
      run.finishedAt = new Date();
      run.results = [];
      return { run, completion: Promise.resolve(run) };
    }

    this.recordRun(run);
    logger.info(
      { runId: run.id, channelId, trigger, days: days.length, claimed: run.claimed, skipped: run.skipped },
      "Registration run started"
    );
    await this.notify(channelId, this.describeStart(run, rows.length));

    const completion = handle.results.then((results) => this.finishRun(run, results));
    return { run, completion };
  }

  private workerEntry(channelId: string): DayWorkerEntry {
    return (label, rows) =>
      new RegistrationWorker({
        channelId,
        registry: this.deps.registry,
        createGateway: this.deps.createGateway,
        solver: this.deps.solver,
        messenger: this.deps.messenger,
        pendingStore: this.deps.pendingStore,
        classify: this.deps.classify,
        maxAttempts: this.deps.maxAttempts,
        manualFallbackOnExhaustion: this.deps.manualFallbackOnExhaustion,
      }).run(label, rows);
  }

  private describeStart(run: RegistrationRun, rowCount: number): string {
    if (run.days.length === 0) {
      return "No sale days found on the form.";
    }

    const lines = [
      `Found ${run.days.length} sale day(s); starting ${run.claimed.length} ` +
        `with ${rowCount} roster row(s) (${this.assignmentMode}).`,
    ];
    if (run.skipped.length > 0) {
      lines.push(`Already in progress or done: ${run.skipped.join(", ")}`);
    }
    return lines.join("\n");
  }

  private async finishRun(run: RegistrationRun, results: DayResult[]): Promise<RegistrationRun> {
    run.finishedAt = new Date();
    run.results = results;

    const rows = results.flatMap((day) => day.rows);
    const registered = rows.filter((row) => row.status === "SUCCESS").length;
    const awaiting = rows.filter((row) => row.status === "AWAITING_MANUAL").length;
    const notRegistered = rows.length - registered - awaiting;

    logger.info(
      { runId: run.id, days: results.length, registered, awaiting, notRegistered },
      "Registration run finished"
    );

    if (results.length > 0) {
      const lines = [
        `Done with ${results.length} sale day(s): ${registered} registered, ` +
          `${awaiting} awaiting captcha, ${notRegistered} not registered.`,
      ];
      if (this.deps.pendingStore.countByChannel(run.channelId) > 0) {
        lines.push("Reply to each captcha image with its code.");
      }
      await this.notify(run.channelId, lines.join("\n"));
    }
    return run;
  }

  private notify(channelId: string, text: string): Promise<void> {
    return notifyOperator(this.deps.messenger, channelId, text);
  }
}
