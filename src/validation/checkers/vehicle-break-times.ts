import { parseInterval } from "../intervals.js";
import { VALIDATION_CODES } from "../validation.types.js";
import { breakPath, reportWindowsWithinShift, shiftWindow } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Reports invalid or overlapping break time windows, and break windows that
 * fall outside their shift.
 *
 * Containment is only checked against a shift whose own window is valid;
 * an invalid shift is reported by `vehicle-shift-times`.
 */
export function createVehicleBreakTimesChecker(): ProblemChecker & {
  name: "vehicle-break-times";
} {
  const name = "vehicle-break-times";
  const code = VALIDATION_CODES.VEHICLE_BREAK_TIMES;

  return {
    name,
    code,
    check(problem, reporter) {
      problem.fleet.types.forEach((type, typeIndex) => {
        type.shifts.forEach((shift, shiftIndex) => {
          const shiftInterval = parseInterval(shiftWindow(shift), shiftIndex);

          shift.breaks?.forEach((vehicleBreak, breakIndex) => {
            const path = breakPath(typeIndex, shiftIndex, breakIndex);

            reportWindowsWithinShift(reporter, vehicleBreak.times, shiftInterval, {
              code,
              checker: name,
              subject: `Vehicle type "${type.typeId}" shift #${shiftIndex} break #${breakIndex}`,
              pathOf: (i) => `${path}.times[${i}]`,
              ids: { typeIds: [type.typeId] },
            });
          });
        });
      });
    },
  };
}
