/**
 * Day Scheduler
 *
 * Supervises the per-day workers. Claims go through the DayRegistry; each
 * claimed day runs as one tracked task in a bounded pool, so at most
 * `maxConcurrency` days talk to the site at once.
 *
 * A task never rejects: an entry point that throws becomes a FAILED day
 * result and the claim is released if the entry point did not do it.
 */
import pLimit from "p-limit";
import config from "../config";
import { logger } from "../monitoring/logger";
import {
  Assignment,
  DayReleaseOutcome,
  DayResult,
  RegistrantRow,
} from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";
import { DayRegistry } from "./day.registry";

/** Runs one sale day; normally RegistrationWorker.run */
export type DayWorkerEntry = (label: string, rows: RegistrantRow[]) => Promise<DayResult>;

export interface DispatchHandle {
  claimed: string[];
  /** Labels of the assignment some other run already owns or finished */
  skipped: string[];
  results: Promise<DayResult[]>;
}

export class DayScheduler {
  private readonly registry: DayRegistry;
  private readonly limit: pLimit.Limit;
  private readonly tasks = new Map<string, Promise<DayResult>>();

  constructor(registry: DayRegistry, maxConcurrency: number = config.maxWorkers) {
    this.registry = registry;
    this.limit = pLimit(Math.max(1, maxConcurrency));
  }

  claim(labels: readonly string[]): string[] {
    return this.registry.claim(labels);
  }

  release(label: string, outcome: DayReleaseOutcome = "succeeded"): void {
    this.registry.release(label, outcome);
  }

  /**
   * Start the worker for a claimed day and return its task without
   * waiting for it.
   */
  spawn(label: string, rows: RegistrantRow[], entry: DayWorkerEntry): Promise<DayResult> {
    const startedAt = Date.now();
    const task: Promise<DayResult> = this.limit(() => entry(label, rows))
      .catch((error: unknown) => this.toFailedResult(label, error, startedAt))
      .finally(() => {
        if (this.tasks.get(label) === task) this.tasks.delete(label);
      });

    this.tasks.set(label, task);
    return task;
  }

  /** Claim every day of the assignment and spawn a worker per claimed day */
  dispatch(assignment: Assignment, entry: DayWorkerEntry): DispatchHandle {
    const labels = Array.from(assignment.keys());
    const claimed = this.claim(labels);
    const skipped = labels.filter((label) => !claimed.includes(label));

    if (skipped.length > 0) {
      logger.info({ skipped }, "Sale days already claimed elsewhere");
    }

    const results = Promise.all(
      claimed.map((label) => this.spawn(label, assignment.get(label) ?? [], entry))
    );
    return { claimed, skipped, results };
  }

  /** Labels whose task is queued or running */
  activeDays(): string[] {
    return Array.from(this.tasks.keys());
  }

  /** Wait for every task spawned so far */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.tasks.values()));
  }

  private toFailedResult(label: string, error: unknown, startedAt: number): DayResult {
    const message = errorMessage(error);
    logger.error({ dayLabel: label, error: message }, "Sale day task rejected");

    if (this.registry.isActive(label)) {
      this.registry.release(label, "failed");
    }
    return {
      label,
      status: "FAILED",
      rows: [],
      skippedRows: [],
      error: message,
      durationMs: Date.now() - startedAt,
    };
  }
}
