import { TASK_ROLES } from "../../problem.types.js";
import { VALIDATION_CODES } from "../validation.types.js";
import { taskPath, unique, vehicleTypePath } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";
import { hasMixedDemandDimensions } from "./demand-balance.js";

/**
 * Reports capacity and demand vectors whose number of dimensions differs
 * from the fleet's.
 *
 * The first vehicle type sets the fleet's dimensions. Every other type with
 * a different capacity size is reported, then every job with at least one
 * task demand of a different size (once per job). Jobs whose pickups and
 * deliveries already disagree with each other are left to `demand-balance`.
 * Nothing is checked for an empty fleet.
 */
export function createCapacityDimensionsChecker(): ProblemChecker & {
  name: "capacity-dimensions";
} {
  const name = "capacity-dimensions";
  const code = VALIDATION_CODES.CAPACITY_DIMENSIONS;

  return {
    name,
    code,
    check(problem, reporter) {
      const [reference] = problem.fleet.types;
      if (!reference) return;
      const dimensions = reference.capacity.length;

      problem.fleet.types.forEach((type, typeIndex) => {
        if (type.capacity.length === dimensions) return;
        reporter.report({
          code,
          checker: name,
          message:
            `Vehicle type "${type.typeId}" has ${type.capacity.length} capacity dimension(s), ` +
            `expected ${dimensions} as in vehicle type "${reference.typeId}"`,
          context: { paths: [`${vehicleTypePath(typeIndex)}.capacity`], typeIds: [type.typeId] },
        });
      });

      problem.plan.jobs.forEach((job, jobIndex) => {
        if (hasMixedDemandDimensions(job)) return;

        const mismatched = TASK_ROLES.flatMap((role) =>
          (job[role] ?? []).flatMap((task, taskIndex) => {
            if (task.demand.length === dimensions) return [];
            const path = `${taskPath(jobIndex, role, taskIndex)}.demand`;
            return [{ path, size: task.demand.length }];
          }),
        );
        if (mismatched.length === 0) return;

        const sizes = unique(mismatched.map((task) => task.size)).join(", ");
        reporter.report({
          code,
          checker: name,
          message: `Job "${job.id}" has demand with ${sizes} dimension(s), expected ${dimensions}`,
          context: { paths: mismatched.map((task) => task.path), jobIds: [job.id] },
        });
      });
    },
  };
}
