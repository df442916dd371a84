/**
 * Scheduler Service
 *
 * Periodically re-reads the form for every channel's latest roster and
 * dispatches sale days that appeared since the last look. Days already
 * claimed or finished are skipped by the registry.
 *
 * Disabled unless RESCAN_INTERVAL_MINUTES > 0.
 */
import { schedule, ScheduledTask } from "node-cron";
import config from "../config";
import { logger } from "../monitoring/logger";
import { RegistrationService } from "../registration/registration.service";
import { errorMessage } from "../shared/utils/errors";

let isRunning = false;
let task: ScheduledTask | null = null;

/**
 * Cron expression for "every N minutes". Cron steps restart each hour, so
 * the spacing is only even when N divides 60; anything else is logged.
 */
export function rescanCronExpression(intervalMinutes: number): string {
  const step = Math.min(Math.max(1, Math.floor(intervalMinutes)), 59);
  if (step !== intervalMinutes || 60 % step !== 0) {
    logger.warn(
      { intervalMinutes, cronStepMinutes: step },
      "Rescan interval does not map to an even cron step; runs at every multiple of the step within each hour"
    );
  }
  return `*/${step} * * * *`;
}

/**
 * Run one rescan cycle. Returns the number of days dispatched, or null
 * when the previous cycle is still running.
 */
export async function runRescanCycle(service: RegistrationService): Promise<number | null> {
  if (isRunning) {
    logger.warn("Rescan cycle already in progress — skipping");
    return null;
  }

  isRunning = true;
  const startTime = Date.now();

  try {
    const dispatched = await service.rescan();
    logger.info({ durationMs: Date.now() - startTime, dispatched }, "Rescan cycle completed");
    return dispatched;
  } catch (error) {
    logger.error(
      { error: errorMessage(error), durationMs: Date.now() - startTime },
      "Rescan cycle failed"
    );
    return 0;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the rescan cron job. Returns false when rescans are disabled.
 */
export function startScheduler(
  service: RegistrationService,
  intervalMinutes: number = config.rescanIntervalMinutes
): boolean {
  if (intervalMinutes <= 0) {
    logger.info("Rescan scheduler disabled");
    return false;
  }

  const cronExpression = rescanCronExpression(intervalMinutes);
  logger.info({ intervalMinutes, cronExpression }, "Starting rescan scheduler");

  task = schedule(cronExpression, () => {
    void runRescanCycle(service);
  });
  return true;
}

export function stopScheduler(): void {
  task?.stop();
  task = null;
}
