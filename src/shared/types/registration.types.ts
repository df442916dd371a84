/**
 * Registration Types
 *
 * Data structures shared by the day registry, the per-day workers and the
 * per-row captcha attempt loop.
 */

/** Lifecycle of a sale day inside the registry */
export type SalesDayState = "PENDING" | "ACTIVE" | "COMPLETED";

/** What happens to a day whose worker failed */
export type DayReleasePolicy = "never-retry" | "retry-on-failure";

/** How roster rows are spread across sale days */
export type AssignmentMode = "round-robin" | "all";

/**
 * A selectable date on the registration form.
 * The label (dd/mm/yyyy) is what the operator sees; the id is resolved lazily.
 */
export interface SalesDay {
  label: string;
  id: string | null;
  state: SalesDayState;
  claimedAt?: Date;
  completedAt?: Date;
  /** Outcome passed to the last release */
  lastOutcome?: DayReleaseOutcome;
}

export type DayReleaseOutcome = "succeeded" | "failed";

/** A time slot under a sale day */
export interface Session {
  id: string;
  label: string;
}

/** Spreadsheet columns for one registrant */
export interface RegistrantFields {
  FullName: string;
  DOB_Day: number | string;
  DOB_Month: number | string;
  DOB_Year: number | string;
  Phone: string;
  Email: string;
  IDNumber: string;
}

/**
 * One registrant. The index is assigned once at ingestion and identifies
 * the row in every report and pending captcha key.
 */
export interface RegistrantRow {
  index: number;
  fields: RegistrantFields;
  sessionName?: string;
}

/** Sale day label → rows to register on that day, in processing order */
export type Assignment = Map<string, RegistrantRow[]>;

/** Classification of the raw text returned by a registration submit */
export type SubmissionOutcome =
  | "SUCCESS"
  | "SESSION_FULL"
  | "CAPTCHA_REJECTED"
  | "OTHER_FAILURE";

/** Terminal state of one row's attempt loop */
export type RowStatus =
  | "SUCCESS"
  | "SESSION_FULL"
  | "OTHER_FAILURE"
  | "FAILED"
  | "AWAITING_MANUAL"
  | "ERROR";

export interface RowResult {
  dayLabel: string;
  rowIndex: number;
  status: RowStatus;
  /** Submissions or solve attempts consumed; manual hand-off does not count */
  attempts: number;
  message?: string;
}

export type DayStatus =
  | "COMPLETED"
  | "SESSION_FULL"
  | "UNRESOLVED_DAY"
  | "NO_SESSIONS"
  | "FAILED";

export interface DayResult {
  label: string;
  dayId?: string;
  session?: Session;
  status: DayStatus;
  rows: RowResult[];
  /** Row indexes never attempted because the session filled up */
  skippedRows: number[];
  error?: string;
  durationMs: number;
}

/** Identifies a manual captcha task */
export interface PendingTaskKey {
  channelId: string;
  dayLabel: string;
  rowIndex: number;
}
