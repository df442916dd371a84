/**
 * Custom Error Classes for Registration Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * Workers use these to classify failures in row and day results.
 * Session-full and manual hand-off are outcomes, not errors.
 */
import { ERROR_CODES } from "../../config/constants";

/**
 * Base class for all registration errors.
 * Includes an error code for classification in results and logs.
 */
export class RegistrationError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean = true) {
    super(message);
    this.name = "RegistrationError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Transport or HTTP failure after the gateway exhausted its own retries */
export class SiteUnreachableError extends RegistrationError {
  public readonly operation: string;

  constructor(operation: string, message: string = "Registration site unreachable") {
    super(`${operation}: ${message}`, ERROR_CODES.SITE_UNREACHABLE, true);
    this.name = "SiteUnreachableError";
    this.operation = operation;
  }
}

/** The sale day label has no matching option on the form */
export class UnresolvedDayError extends RegistrationError {
  constructor(label: string) {
    super(`Sale day not found on the form: ${label}`, ERROR_CODES.UNRESOLVED_DAY, true);
    this.name = "UnresolvedDayError";
  }
}

/** A row cannot be turned into a registration payload */
export class InvalidRowError extends RegistrationError {
  constructor(rowIndex: number, message: string) {
    super(`Row ${rowIndex + 1}: ${message}`, ERROR_CODES.INVALID_ROW, false);
    this.name = "InvalidRowError";
  }
}

/** The uploaded roster is missing columns or has invalid rows */
export class RosterFormatError extends RegistrationError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Roster rejected: ${problems.join("; ")}`, ERROR_CODES.ROSTER_FORMAT, false);
    this.name = "RosterFormatError";
    this.problems = problems;
  }
}
