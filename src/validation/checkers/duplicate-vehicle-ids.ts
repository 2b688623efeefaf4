import { VALIDATION_CODES } from "../validation.types.js";
import { findDuplicates, unique, vehicleTypePath } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

interface VehicleEntry {
  readonly vehicleId: string;
  readonly typeId: string;
  readonly path: string;
}

/**
 * Reports vehicle ids used more than once anywhere in the fleet.
 *
 * Vehicle ids are unique across all vehicle types, not only within one
 * type, so ids are collected from every type before duplicates are looked
 * for. Each error names the vehicle id and the types holding it.
 */
export function createDuplicateVehicleIdsChecker(): ProblemChecker & {
  name: "duplicate-vehicle-ids";
} {
  const name = "duplicate-vehicle-ids";
  const code = VALIDATION_CODES.DUPLICATE_VEHICLE_IDS;

  return {
    name,
    code,
    check(problem, reporter) {
      const entries: VehicleEntry[] = problem.fleet.types.flatMap((type, typeIndex) =>
        type.vehicleIds.map((vehicleId, idIndex) => ({
          vehicleId,
          typeId: type.typeId,
          path: `${vehicleTypePath(typeIndex)}.vehicleIds[${idIndex}]`,
        })),
      );

      for (const { key, occurrences } of findDuplicates(entries, (entry) => entry.vehicleId)) {
        const typeIds = unique(occurrences.map((entry) => entry.typeId));
        const typeList = typeIds.map((typeId) => `"${typeId}"`).join(", ");
        reporter.report({
          code,
          checker: name,
          message: `Vehicle id "${key}" is used ${occurrences.length} times in vehicle types ${typeList}`,
          context: {
            paths: occurrences.map((entry) => entry.path),
            vehicleIds: [key],
            typeIds,
          },
        });
      }
    },
  };
}
