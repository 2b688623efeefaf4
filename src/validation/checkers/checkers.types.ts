import type { Problem } from "../../problem.types.js";
import type { ValidationReporter } from "../validation-reporter.js";
import type { ValidationCode } from "../validation.types.js";

/**
 * Checks one kind of inconsistency in a problem definition.
 *
 * Checkers are independent of each other: each reads the problem and reports
 * what it finds, without mutating the problem or depending on what other
 * checkers found. Use the `create*Checker` functions to create built-in
 * checkers.
 *
 * @category Checkers
 */
export interface ProblemChecker {
  /** Unique name, e.g. `"duplicate-job-ids"`. */
  readonly name: string;
  /** Code attached to every error the checker reports. */
  readonly code: ValidationCode;
  check(problem: Problem, reporter: ValidationReporter): void;
}

export const BUILT_IN_CHECKER_NAMES = [
  "duplicate-job-ids",
  "demand-balance",
  "job-time-windows",
  "duplicate-vehicle-type-ids",
  "duplicate-vehicle-ids",
  "vehicle-shift-times",
  "vehicle-break-times",
  "capacity-dimensions",
  "vehicle-reload-times",
] as const;

/** @category Checkers */
export type CheckerName = (typeof BUILT_IN_CHECKER_NAMES)[number];

export type BuiltInCheckers = {
  readonly [K in CheckerName]: ProblemChecker & { readonly name: K };
};
