/**
 * Pending Captcha Store
 *
 * Holds the captcha challenges handed to the operator, at most one per
 * (channel, day, row). Every pop removes the task, so an answer is
 * submitted at most once. Tasks nobody answers stay until the process
 * exits; list() exposes them to the admin API.
 */
import { logger } from "../monitoring/logger";
import { SiteGateway } from "../site/site.gateway";
import { PendingTaskKey, RegistrantRow } from "../shared/types/registration.types";

export interface PendingManualTask {
  key: PendingTaskKey;
  dayId: string;
  sessionId: string;
  row: RegistrantRow;
  /** Site session the challenge was issued on; the answer must go through it */
  gateway: SiteGateway;
  image: Buffer;
  /** Operator message carrying the image, when the transport reports one */
  messageId: string | null;
  createdAt: Date;
}

export type PendingTaskSummary = Omit<PendingManualTask, "gateway" | "image" | "row"> & {
  fullName: string;
};

export function pendingKeyToString(key: PendingTaskKey): string {
  return `${key.channelId}|${key.dayLabel}|${key.rowIndex}`;
}

export class PendingCaptchaStore {
  // Insertion order doubles as age: the first entry of a channel is its oldest task
  private readonly tasks = new Map<string, PendingManualTask>();

  /** Insert a task; a task already stored under the same key is replaced */
  put(task: PendingManualTask): void {
    const id = pendingKeyToString(task.key);
    const replaced = this.tasks.delete(id);
    this.tasks.set(id, task);

    logger.debug(
      { ...task.key, messageId: task.messageId, replaced },
      "Manual captcha task registered"
    );
  }

  /** Pop the task with this exact key */
  pop(key: PendingTaskKey): PendingManualTask | null {
    const id = pendingKeyToString(key);
    const task = this.tasks.get(id);
    if (!task) return null;
    this.tasks.delete(id);
    return task;
  }

  /** Pop the task whose operator message was replied to */
  popByMessage(channelId: string, messageId: string): PendingManualTask | null {
    for (const [id, task] of this.tasks) {
      if (task.key.channelId === channelId && task.messageId === messageId) {
        this.tasks.delete(id);
        return task;
      }
    }
    return null;
  }

  /**
   * Pop the oldest task of a channel. Used when the reply carries no
   * message reference; with several rows pending in one channel the answer
   * goes to the oldest, which may not be the image the operator read.
   */
  popByChannel(channelId: string): PendingManualTask | null {
    for (const [id, task] of this.tasks) {
      if (task.key.channelId === channelId) {
        this.tasks.delete(id);
        return task;
      }
    }
    return null;
  }

  get(key: PendingTaskKey): PendingManualTask | null {
    return this.tasks.get(pendingKeyToString(key)) ?? null;
  }

  size(): number {
    return this.tasks.size;
  }

  countByChannel(channelId: string): number {
    let count = 0;
    for (const task of this.tasks.values()) {
      if (task.key.channelId === channelId) count++;
    }
    return count;
  }

  list(): PendingTaskSummary[] {
    return Array.from(this.tasks.values(), (task) => ({
      key: { ...task.key },
      dayId: task.dayId,
      sessionId: task.sessionId,
      messageId: task.messageId,
      createdAt: task.createdAt,
      fullName: task.row.fields.FullName,
    }));
  }
}
