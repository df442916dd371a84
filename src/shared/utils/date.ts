/**
 * Date Utilities
 *
 * Birth dates arrive as three spreadsheet cells; moment checks that they
 * name a real calendar day (no 31/02, no 29/02 outside leap years).
 */
import moment from "moment-timezone";

/** Whether day/month/year form a real calendar date */
export function isValidBirthDate(day: number, month: number, year: number): boolean {
  return moment({ year, month: month - 1, date: day }).isValid();
}
