import { checkTimeWindows } from "../intervals.js";
import { VALIDATION_CODES } from "../validation.types.js";
import { reportIntervalIssues, shiftPath, shiftWindow } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Reports invalid or overlapping shifts of a vehicle type.
 *
 * Shift windows go through the same checks as job time windows.
 */
export function createVehicleShiftTimesChecker(): ProblemChecker & {
  name: "vehicle-shift-times";
} {
  const name = "vehicle-shift-times";
  const code = VALIDATION_CODES.VEHICLE_SHIFT_TIMES;

  return {
    name,
    code,
    check(problem, reporter) {
      problem.fleet.types.forEach((type, typeIndex) => {
        const windows = type.shifts.map(shiftWindow);

        reportIntervalIssues(reporter, windows, checkTimeWindows(windows), {
          code,
          checker: name,
          subject: `Vehicle type "${type.typeId}"`,
          label: "shift",
          pathOf: (i) => shiftPath(typeIndex, i),
          ids: { typeIds: [type.typeId] },
        });
      });
    },
  };
}
