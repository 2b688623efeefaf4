import type {
  Job,
  JobTask,
  Problem,
  TimeWindow,
  VehicleShift,
  VehicleType,
} from "../../src/problem.types.js";
import type { ProblemChecker } from "../../src/validation/checkers/checkers.types.js";
import { ValidationReporterImpl } from "../../src/validation/validation-reporter.js";
import type { ValidationError } from "../../src/validation/validation.types.js";

// ============================================================================
// Simple Configuration Helpers
// ============================================================================

const DEPOT = { lat: 52.52, lng: 13.405 };

/** Timestamp on 2020-07-04 (UTC) at the given hour. */
export const at = (hours: number, minutes = 0) =>
  `2020-07-04T${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}:00Z`;

/** Window on 2020-07-04 between two hours. */
export const span = (startHour: number, endHour: number): TimeWindow => [
  at(startHour),
  at(endHour),
];

export const task = (demand: number[], times?: TimeWindow[]): JobTask => ({
  places: [{ location: DEPOT, duration: 120 }],
  demand,
  ...(times ? { times } : {}),
});

export const job = (
  id: string,
  tasks: { pickups?: JobTask[]; deliveries?: JobTask[] } = { deliveries: [task([1])] },
): Job => ({ id, ...tasks });

export const shift = (
  startHour: number,
  endHour?: number,
  breaks?: TimeWindow[][],
): VehicleShift => ({
  start: { time: at(startHour), location: DEPOT },
  ...(endHour === undefined ? {} : { end: { time: at(endHour), location: DEPOT } }),
  ...(breaks ? { breaks: breaks.map((times) => ({ times, duration: 1800 })) } : {}),
});

export const vehicleType = (
  typeId: string,
  vehicleIds: string[],
  options: { capacity?: number[]; shifts?: VehicleShift[] } = {},
): VehicleType => ({
  typeId,
  vehicleIds,
  profile: "car",
  costs: { distance: 0.002, time: 0.004 },
  capacity: options.capacity ?? [10],
  shifts: options.shifts ?? [shift(8, 18)],
});

export const problem = (
  jobs: Job[],
  types: VehicleType[] = [vehicleType("van", ["van_1"])],
): Problem => ({ plan: { jobs }, fleet: { types } });

/**
 * Runs a single checker with a fresh reporter and returns what it reported.
 */
export function runChecker(checker: ProblemChecker, input: Problem): ValidationError[] {
  const reporter = new ValidationReporterImpl();
  checker.check(input, reporter);
  return reporter.getErrors();
}
