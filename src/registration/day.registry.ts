/**
 * Day Registry
 *
 * Owns the state of every sale day seen by this process and guarantees that
 * a day is worked on by at most one worker at a time.
 *
 * claim() and release() contain no await: each runs to completion on the
 * event loop before any other caller can observe the map, which makes every
 * read-modify-write here a single exclusive section.
 */
import config from "../config";
import { logger } from "../monitoring/logger";
import {
  DayReleaseOutcome,
  DayReleasePolicy,
  SalesDay,
} from "../shared/types/registration.types";

export class DayRegistry {
  private readonly days = new Map<string, SalesDay>();
  private readonly policy: DayReleasePolicy;

  constructor(policy: DayReleasePolicy = config.dayReleasePolicy) {
    this.policy = policy;
  }

  /**
   * Atomically claim the labels that are neither ACTIVE nor COMPLETED.
   * Duplicates in the input are claimed once. Order is preserved.
   */
  claim(candidateLabels: readonly string[]): string[] {
    const claimed: string[] = [];

    for (const label of candidateLabels) {
      const existing = this.days.get(label);
      if (existing && existing.state !== "PENDING") continue;

      this.days.set(label, {
        label,
        id: existing?.id ?? null,
        state: "ACTIVE",
        claimedAt: new Date(),
        lastOutcome: existing?.lastOutcome,
      });
      claimed.push(label);
    }

    if (claimed.length > 0) {
      logger.debug({ claimed, candidates: candidateLabels.length }, "Sale days claimed");
    }
    return claimed;
  }

  /**
   * Finish a claim. Under "never-retry" the day is COMPLETED whatever the
   * outcome; under "retry-on-failure" a failed day goes back to PENDING.
   * Releasing a day that is not ACTIVE does nothing.
   */
  release(label: string, outcome: DayReleaseOutcome = "succeeded"): void {
    const day = this.days.get(label);
    if (!day || day.state !== "ACTIVE") {
      logger.warn({ dayLabel: label, state: day?.state }, "Release of a sale day that is not active");
      return;
    }

    const reopen = outcome === "failed" && this.policy === "retry-on-failure";
    this.days.set(label, {
      ...day,
      state: reopen ? "PENDING" : "COMPLETED",
      completedAt: reopen ? undefined : new Date(),
      lastOutcome: outcome,
    });

    logger.info(
      { dayLabel: label, outcome, state: reopen ? "PENDING" : "COMPLETED", policy: this.policy },
      "Sale day released"
    );
  }

  /** Remember the form id resolved for a label */
  recordId(label: string, id: string): void {
    const day = this.days.get(label);
    if (day) {
      this.days.set(label, { ...day, id });
    }
  }

  getState(label: string): SalesDay["state"] | undefined {
    return this.days.get(label)?.state;
  }

  isActive(label: string): boolean {
    return this.getState(label) === "ACTIVE";
  }

  /** Copy of every known day, in first-seen order */
  snapshot(): SalesDay[] {
    return Array.from(this.days.values(), (day) => ({ ...day }));
  }

  activeLabels(): string[] {
    return this.snapshot()
      .filter((day) => day.state === "ACTIVE")
      .map((day) => day.label);
  }
}
