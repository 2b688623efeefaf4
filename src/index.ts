/**
 * Consistency checks for vehicle routing problem definitions.
 *
 * Catches definitions a solver would reject or silently misread (duplicate
 * ids, unbalanced pickup and delivery demand, invalid or overlapping time
 * windows) before they reach the solver, and reports every problem found
 * with a stable code.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Problem**: A `plan` of jobs, each with pickups and deliveries that carry
 * a demand vector and optional time windows, and a `fleet` of vehicle types,
 * each with vehicle ids, a capacity vector and shifts. {@link parseProblem}
 * checks a plain document against {@link ProblemSchema} and returns it typed.
 *
 * **Checkers**: Each checker looks for one kind of inconsistency and reports
 * errors with one code:
 * - `E1000` duplicate job ids
 * - `E1001` pickup and delivery demand that don't balance
 * - `E1002` invalid or overlapping job time windows
 * - `E1003` duplicate vehicle type ids
 * - `E1004` vehicle ids repeated anywhere in the fleet
 * - `E1005` invalid or overlapping vehicle shifts
 * - `E1006` invalid or overlapping break windows, or breaks outside their shift
 * - `E1007` demand or capacity vectors of a different size than the fleet's
 * - `E1008` invalid or overlapping reload windows, or reloads outside their shift
 *
 * **Time windows**: `[start, end]` pairs of RFC3339 timestamps. A window must
 * parse and start strictly before it ends; windows in one list must not
 * overlap. Windows are half-open, so windows that only touch are fine.
 *
 * **Validation**: {@link validateProblem} runs all checkers and returns every
 * error found, in a deterministic order. Nothing is thrown for an
 * inconsistent problem; an empty error list means the problem is valid.
 *
 * @example Validate a problem document
 * ```typescript
 * import { validateProblemDocument, summarizeValidation } from "routecheck";
 *
 * const result = validateProblemDocument({
 *   plan: {
 *     jobs: [
 *       {
 *         id: "job1",
 *         pickups: [
 *           {
 *             places: [{ location: { lat: 52.52, lng: 13.4 }, duration: 300 }],
 *             demand: [2],
 *             times: [["2020-07-04T12:00:00Z", "2020-07-04T11:00:00Z"]],
 *           },
 *         ],
 *       },
 *     ],
 *   },
 *   fleet: {
 *     types: [
 *       {
 *         typeId: "van",
 *         vehicleIds: ["van_1", "van_2"],
 *         profile: "car",
 *         costs: { distance: 0.002, time: 0.004 },
 *         capacity: [10],
 *         shifts: [
 *           {
 *             start: { time: "2020-07-04T09:00:00Z", location: { lat: 52.5, lng: 13.38 } },
 *             end: { time: "2020-07-04T18:00:00Z", location: { lat: 52.5, lng: 13.38 } },
 *           },
 *         ],
 *       },
 *     ],
 *   },
 * });
 *
 * result.valid; // false
 * result.errors[0]?.code; // "E1002"
 * summarizeValidation(result); // [{ code: "E1002", title: "Invalid job time windows", ... }]
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Problem model
// ============================================================================

export type {
  TimeWindow,
  Location,
  JobPlace,
  JobTask,
  Job,
  Plan,
  ShiftPlace,
  VehicleBreak,
  VehicleReload,
  VehicleShift,
  VehicleCosts,
  VehicleType,
  Fleet,
  Problem,
  TaskRole,
} from "./problem.types.js";

export { TASK_ROLES } from "./problem.types.js";

export {
  ProblemSchema,
  PlanSchema,
  FleetSchema,
  JobSchema,
  JobTaskSchema,
  VehicleTypeSchema,
  VehicleShiftSchema,
  TimeWindowSchema,
} from "./problem.schemas.js";

// ============================================================================
// Parsing
// ============================================================================

export { parseProblem, parseProblemJson } from "./problem.js";

export { ProblemFormatError } from "./errors.js";

export { parseTimestamp, isTimestamp } from "./datetime.utils.js";

// ============================================================================
// Validation
// ============================================================================

export {
  ProblemValidator,
  validateProblem,
  validateProblemDocument,
} from "./validation/validator.js";

export type { ValidatorOptions } from "./validation/validator.js";

export { summarizeValidation } from "./validation/validation-reporter.js";

export type { ValidationReporter } from "./validation/validation-reporter.js";

export { VALIDATION_CODES, VALIDATION_TITLES } from "./validation/validation.types.js";

export type {
  BuiltInValidationCode,
  ValidationCode,
  ValidationContext,
  ValidationError,
  ValidationResult,
  ValidationSummary,
} from "./validation/validation.types.js";

// ============================================================================
// Time windows
// ============================================================================

export { checkTimeWindows } from "./validation/intervals.js";

export type { IntervalInput, IntervalIssue } from "./validation/intervals.js";

// ============================================================================
// Checkers
// ============================================================================

export {
  createCapacityDimensionsChecker,
  createDemandBalanceChecker,
  createDuplicateJobIdsChecker,
  createDuplicateVehicleIdsChecker,
  createDuplicateVehicleTypeIdsChecker,
  createJobTimeWindowsChecker,
  createVehicleBreakTimesChecker,
  createVehicleReloadTimesChecker,
  createVehicleShiftTimesChecker,
} from "./validation/checkers/index.js";

export { builtInCheckers, createCheckerSet } from "./validation/checkers/registry.js";

export { BUILT_IN_CHECKER_NAMES } from "./validation/checkers/checkers.types.js";

export type { CheckerName, ProblemChecker } from "./validation/checkers/checkers.types.js";
