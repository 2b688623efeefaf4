import { createCapacityDimensionsChecker } from "./capacity-dimensions.js";
import { createDemandBalanceChecker } from "./demand-balance.js";
import { createDuplicateJobIdsChecker } from "./duplicate-job-ids.js";
import { createDuplicateVehicleIdsChecker } from "./duplicate-vehicle-ids.js";
import { createDuplicateVehicleTypeIdsChecker } from "./duplicate-vehicle-type-ids.js";
import { createJobTimeWindowsChecker } from "./job-time-windows.js";
import { createVehicleBreakTimesChecker } from "./vehicle-break-times.js";
import { createVehicleReloadTimesChecker } from "./vehicle-reload-times.js";
import { createVehicleShiftTimesChecker } from "./vehicle-shift-times.js";
import {
  BUILT_IN_CHECKER_NAMES,
  type BuiltInCheckers,
  type CheckerName,
  type ProblemChecker,
} from "./checkers.types.js";

export const builtInCheckers: BuiltInCheckers = {
  "duplicate-job-ids": createDuplicateJobIdsChecker(),
  "demand-balance": createDemandBalanceChecker(),
  "job-time-windows": createJobTimeWindowsChecker(),
  "duplicate-vehicle-type-ids": createDuplicateVehicleTypeIdsChecker(),
  "duplicate-vehicle-ids": createDuplicateVehicleIdsChecker(),
  "vehicle-shift-times": createVehicleShiftTimesChecker(),
  "vehicle-break-times": createVehicleBreakTimesChecker(),
  "capacity-dimensions": createCapacityDimensionsChecker(),
  "vehicle-reload-times": createVehicleReloadTimesChecker(),
};

const isBuiltInName = (name: string): name is CheckerName =>
  (BUILT_IN_CHECKER_NAMES as readonly string[]).includes(name);

/**
 * Built-in checkers in their fixed run order, minus the skipped ones.
 */
export function getBuiltInCheckers(skip: readonly CheckerName[] = []): ProblemChecker[] {
  return BUILT_IN_CHECKER_NAMES.filter((name) => !skip.includes(name)).map(
    (name) => builtInCheckers[name],
  );
}

/**
 * Validates a list of custom checkers, preventing overriding built-in checkers
 * and name clashes between custom checkers.
 */
export function createCheckerSet<C extends readonly ProblemChecker[]>(checkers: C): C {
  const seen = new Set<string>();
  for (const checker of checkers) {
    if (isBuiltInName(checker.name) && checker !== builtInCheckers[checker.name]) {
      throw new Error(`Cannot override built-in checker "${checker.name}" with a custom checker`);
    }
    if (seen.has(checker.name)) {
      throw new Error(`Checker "${checker.name}" is registered more than once`);
    }
    seen.add(checker.name);
  }
  return checkers;
}
