import type { TaskRole, VehicleShift } from "../problem.types.js";
import {
  checkTimeWindows,
  containsInterval,
  parseInterval,
  type IntervalInput,
  type IntervalIssue,
  type ParsedInterval,
} from "./intervals.js";
import type { ValidationReporter } from "./validation-reporter.js";
import type { ValidationCode, ValidationContext } from "./validation.types.js";

// =============================================================================
// Field paths
// =============================================================================

export const jobPath = (jobIndex: number) => `plan.jobs[${jobIndex}]`;

export const taskPath = (jobIndex: number, role: TaskRole, taskIndex: number) =>
  `${jobPath(jobIndex)}.${role}[${taskIndex}]`;

export const vehicleTypePath = (typeIndex: number) => `fleet.types[${typeIndex}]`;

export const shiftPath = (typeIndex: number, shiftIndex: number) =>
  `${vehicleTypePath(typeIndex)}.shifts[${shiftIndex}]`;

export const breakPath = (typeIndex: number, shiftIndex: number, breakIndex: number) =>
  `${shiftPath(typeIndex, shiftIndex)}.breaks[${breakIndex}]`;

export const reloadPath = (typeIndex: number, shiftIndex: number, reloadIndex: number) =>
  `${shiftPath(typeIndex, shiftIndex)}.reloads[${reloadIndex}]`;

export const TASK_LABELS: Readonly<Record<TaskRole, string>> = {
  pickups: "pickup",
  deliveries: "delivery",
};

/**
 * The time window a shift covers; open-ended when the shift has no end.
 */
export function shiftWindow(shift: VehicleShift): IntervalInput {
  return shift.end ? [shift.start.time, shift.end.time] : [shift.start.time];
}

// =============================================================================
// Duplicate detection
// =============================================================================

export interface DuplicateGroup<T> {
  readonly key: string;
  /** Every item carrying the key, in input order. */
  readonly occurrences: readonly T[];
}

/**
 * Groups items by key in one pass and returns the keys held by more than one
 * item, in order of first occurrence.
 */
export function findDuplicates<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
): DuplicateGroup<T>[] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  const duplicates: DuplicateGroup<T>[] = [];
  for (const [key, occurrences] of groups) {
    if (occurrences.length > 1) duplicates.push({ key, occurrences });
  }
  return duplicates;
}

/**
 * Removes repeated values, keeping the first occurrence of each.
 */
export function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

// =============================================================================
// Time window issues
// =============================================================================

export interface IntervalIssueTarget {
  readonly code: ValidationCode;
  readonly checker: string;
  /** Describes the owner of the windows, e.g. `job "job1" pickup #0`. */
  readonly subject: string;
  /** What a single window is called in messages. Defaults to "time window". */
  readonly label?: string;
  /** Path of the window at a given list index. */
  readonly pathOf: (index: number) => string;
  /** Ids added to the context of every reported error. */
  readonly ids: Omit<ValidationContext, "paths">;
}

/**
 * Reports interval checker issues, one error each.
 */
export function reportIntervalIssues(
  reporter: ValidationReporter,
  windows: readonly IntervalInput[],
  issues: readonly IntervalIssue[],
  target: IntervalIssueTarget,
): void {
  for (const issue of issues) {
    const paths =
      issue.kind === "overlap" ? issue.indices.map(target.pathOf) : [target.pathOf(issue.index)];

    reporter.report({
      code: target.code,
      checker: target.checker,
      message: describeIntervalIssue(issue, windows, target.subject, target.label ?? "time window"),
      context: { paths, ...target.ids },
    });
  }
}

function describeIntervalIssue(
  issue: IntervalIssue,
  windows: readonly IntervalInput[],
  subject: string,
  label: string,
): string {
  switch (issue.kind) {
    case "unparseable": {
      const window = windows[issue.index];
      const values = issue.endpoints
        .map((endpoint) => `${endpoint} "${endpoint === "start" ? window?.[0] : window?.[1]}"`)
        .join(" and ");
      return `${subject}: ${label} #${issue.index} has an invalid RFC3339 ${values}`;
    }
    case "reversed": {
      const [start, end] = windows[issue.index] ?? [];
      return `${subject}: ${label} #${issue.index} starts at ${start}, not before its end ${end}`;
    }
    case "overlap": {
      const [first, second] = issue.indices;
      return `${subject}: ${label}s #${first} and #${second} overlap`;
    }
  }
}

/**
 * Checks the time windows of something scheduled during a shift (a break or
 * a reload): each issue of the interval checker is reported, then every valid
 * window not inside the shift.
 *
 * Containment is skipped when `shiftInterval` is an issue, i.e. the shift's
 * own window is invalid.
 */
export function reportWindowsWithinShift(
  reporter: ValidationReporter,
  windows: readonly IntervalInput[],
  shiftInterval: ParsedInterval | IntervalIssue,
  target: IntervalIssueTarget,
): void {
  reportIntervalIssues(reporter, windows, checkTimeWindows(windows), target);
  if ("kind" in shiftInterval) return;

  const label = target.label ?? "time window";
  windows.forEach((window, i) => {
    const interval = parseInterval(window, i);
    if ("kind" in interval || containsInterval(shiftInterval, interval)) return;

    reporter.report({
      code: target.code,
      checker: target.checker,
      message: `${target.subject}: ${label} #${i} is outside the shift`,
      context: { paths: [target.pathOf(i)], ...target.ids },
    });
  });
}
