import { parseInterval } from "../intervals.js";
import { VALIDATION_CODES } from "../validation.types.js";
import { reloadPath, reportWindowsWithinShift, shiftWindow } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Reports invalid or overlapping reload time windows, and reload windows
 * outside their shift. Reloads without `times` can happen at any point of
 * the shift and are not checked.
 */
export function createVehicleReloadTimesChecker(): ProblemChecker & {
  name: "vehicle-reload-times";
} {
  const name = "vehicle-reload-times";
  const code = VALIDATION_CODES.VEHICLE_RELOAD_TIMES;

  return {
    name,
    code,
    check(problem, reporter) {
      problem.fleet.types.forEach((type, typeIndex) => {
        type.shifts.forEach((shift, shiftIndex) => {
          const shiftInterval = parseInterval(shiftWindow(shift), shiftIndex);

          shift.reloads?.forEach((reload, reloadIndex) => {
            if (!reload.times) return;
            const path = reloadPath(typeIndex, shiftIndex, reloadIndex);

            reportWindowsWithinShift(reporter, reload.times, shiftInterval, {
              code,
              checker: name,
              subject: `Vehicle type "${type.typeId}" shift #${shiftIndex} reload #${reloadIndex}`,
              pathOf: (i) => `${path}.times[${i}]`,
              ids: { typeIds: [type.typeId] },
            });
          });
        });
      });
    },
  };
}
