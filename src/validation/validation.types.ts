// =============================================================================
// Error codes
// =============================================================================

/**
 * Stable codes of the problems the validator reports.
 *
 * @category Validation
 */
export const VALIDATION_CODES = {
  DUPLICATE_JOB_IDS: "E1000",
  DEMAND_BALANCE: "E1001",
  JOB_TIME_WINDOWS: "E1002",
  DUPLICATE_VEHICLE_TYPE_IDS: "E1003",
  DUPLICATE_VEHICLE_IDS: "E1004",
  VEHICLE_SHIFT_TIMES: "E1005",
  VEHICLE_BREAK_TIMES: "E1006",
  CAPACITY_DIMENSIONS: "E1007",
  VEHICLE_RELOAD_TIMES: "E1008",
} as const;

/** Human-readable titles of the built-in codes, used in summaries. */
export const VALIDATION_TITLES: Readonly<Record<BuiltInValidationCode, string>> = {
  E1000: "Duplicate job ids",
  E1001: "Unbalanced pickup and delivery demand",
  E1002: "Invalid job time windows",
  E1003: "Duplicate vehicle type ids",
  E1004: "Duplicate vehicle ids",
  E1005: "Invalid vehicle shift times",
  E1006: "Invalid vehicle break times",
  E1007: "Mismatched capacity dimensions",
  E1008: "Invalid vehicle reload times",
};

/** @category Validation */
export type BuiltInValidationCode = (typeof VALIDATION_CODES)[keyof typeof VALIDATION_CODES];

/**
 * Code of a validation error. Built-in checkers use the `E1xxx` codes from
 * {@link VALIDATION_CODES}; custom checkers may use any string.
 *
 * @category Validation
 */
export type ValidationCode = BuiltInValidationCode | (string & {});

// =============================================================================
// Errors
// =============================================================================

/**
 * Locates the elements an error refers to.
 *
 * `paths` name fields in the problem document, e.g.
 * `plan.jobs[2].pickups[0].times[1]`. The id lists repeat the identifiers
 * found at those paths so callers can render them without re-reading the
 * problem.
 */
export interface ValidationContext {
  readonly paths: readonly string[];
  readonly jobIds?: readonly string[];
  readonly typeIds?: readonly string[];
  readonly vehicleIds?: readonly string[];
}

/**
 * A single inconsistency found in a problem definition.
 *
 * @category Validation
 */
export interface ValidationError {
  /** Deterministic id derived from code and context (e.g. `"E1000:plan.jobs[0],plan.jobs[3]"`). */
  readonly id: string;
  readonly code: ValidationCode;
  /** Name of the checker that reported the error. */
  readonly checker: string;
  readonly message: string;
  readonly context: ValidationContext;
}

// =============================================================================
// Complete validation result
// =============================================================================

/** @category Validation */
export interface ValidationResult {
  /** True when no checker reported an error. */
  readonly valid: boolean;
  /** Errors in checker order, then in the order each checker found them. */
  readonly errors: readonly ValidationError[];
}

// =============================================================================
// Validation Summary - aggregated view for display
// =============================================================================

/**
 * Errors of one code, aggregated.
 * Use `summarizeValidation()` to create these from a `ValidationResult`.
 *
 * @category Validation
 */
export interface ValidationSummary {
  readonly code: ValidationCode;
  readonly checker: string;
  /** Human-readable title for this code (e.g., "Duplicate job ids"). */
  readonly title: string;
  readonly count: number;
  /** All paths referenced by errors of this code, in report order. */
  readonly paths: readonly string[];
}
