import { VALIDATION_CODES } from "../validation.types.js";
import { findDuplicates, vehicleTypePath } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Reports vehicle type ids used by more than one vehicle type.
 */
export function createDuplicateVehicleTypeIdsChecker(): ProblemChecker & {
  name: "duplicate-vehicle-type-ids";
} {
  const name = "duplicate-vehicle-type-ids";
  const code = VALIDATION_CODES.DUPLICATE_VEHICLE_TYPE_IDS;

  return {
    name,
    code,
    check(problem, reporter) {
      const types = problem.fleet.types.map((type, index) => ({ typeId: type.typeId, index }));

      for (const { key, occurrences } of findDuplicates(types, (type) => type.typeId)) {
        reporter.report({
          code,
          checker: name,
          message: `Vehicle type id "${key}" is used by ${occurrences.length} vehicle types`,
          context: {
            paths: occurrences.map((type) => vehicleTypePath(type.index)),
            typeIds: [key],
          },
        });
      }
    },
  };
}
