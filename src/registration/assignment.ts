/**
 * Assignment Builder
 *
 * Spreads roster rows over the sale days found on the form.
 */
import {
  Assignment,
  AssignmentMode,
  RegistrantRow,
} from "../shared/types/registration.types";

/**
 * round-robin: step i (0 ≤ i < max(days, rows)) gives row i mod R to day
 * i mod D, so every day gets a row and every row gets a day.
 * all: every day gets every row.
 */
export function buildAssignment(
  labels: readonly string[],
  rows: readonly RegistrantRow[],
  mode: AssignmentMode = "round-robin"
): Assignment {
  const days = Array.from(new Set(labels));
  const assignment: Assignment = new Map();
  if (days.length === 0 || rows.length === 0) return assignment;

  for (const label of days) {
    assignment.set(label, mode === "all" ? [...rows] : []);
  }
  if (mode === "all") return assignment;

  const steps = Math.max(days.length, rows.length);
  for (let i = 0; i < steps; i++) {
    assignment.get(days[i % days.length])?.push(rows[i % rows.length]);
  }
  return assignment;
}
