import type { Job, JobTask } from "../../problem.types.js";
import { VALIDATION_CODES } from "../validation.types.js";
import { jobPath, unique } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Sums demand vectors dimension-wise. All vectors must have `dimensions` entries.
 */
export function sumDemands(demands: readonly (readonly number[])[], dimensions: number): number[] {
  const total = new Array<number>(dimensions).fill(0);
  for (const demand of demands) {
    demand.forEach((amount, i) => {
      total[i] = (total[i] ?? 0) + amount;
    });
  }
  return total;
}

const formatDemand = (demand: readonly number[]) => `[${demand.join(", ")}]`;

const demandsOf = (tasks: readonly JobTask[]) => tasks.map((task) => task.demand);

const dimensionsOf = (demands: readonly (readonly number[])[]) =>
  unique(demands.map((demand) => demand.length));

/**
 * True when a job has both pickups and deliveries whose demands disagree on
 * the number of dimensions. Such a job is reported by `demand-balance` and
 * left out of `capacity-dimensions`.
 */
export function hasMixedDemandDimensions(job: Job): boolean {
  const pickups = demandsOf(job.pickups ?? []);
  const deliveries = demandsOf(job.deliveries ?? []);
  if (pickups.length === 0 || deliveries.length === 0) return false;
  return dimensionsOf([...pickups, ...deliveries]).length > 1;
}

/**
 * Describes why a job's pickups and deliveries don't balance, or returns
 * `undefined` if they do. Jobs with only pickups or only deliveries always
 * balance.
 */
export function describeDemandImbalance(job: Job): string | undefined {
  const pickups = demandsOf(job.pickups ?? []);
  const deliveries = demandsOf(job.deliveries ?? []);
  if (pickups.length === 0 || deliveries.length === 0) return undefined;

  const dimensions = dimensionsOf([...pickups, ...deliveries]);
  const [dimension] = dimensions;
  if (dimensions.length > 1 || dimension === undefined) {
    const sizes = (demands: number[][]) => demands.map((demand) => demand.length).join(", ");
    return (
      `Job "${job.id}" mixes demand dimensions: ` +
      `pickups have ${sizes(pickups)}, deliveries have ${sizes(deliveries)}`
    );
  }

  const picked = sumDemands(pickups, dimension);
  const delivered = sumDemands(deliveries, dimension);
  if (picked.every((amount, i) => amount === delivered[i])) return undefined;

  return (
    `Job "${job.id}" picks up ${formatDemand(picked)} ` +
    `but delivers ${formatDemand(delivered)}`
  );
}

/**
 * Reports jobs whose summed pickup demand differs from their summed delivery
 * demand, or whose task demands disagree on the number of dimensions.
 *
 * At most one error is reported per job, however many dimensions differ.
 */
export function createDemandBalanceChecker(): ProblemChecker & { name: "demand-balance" } {
  const name = "demand-balance";
  const code = VALIDATION_CODES.DEMAND_BALANCE;

  return {
    name,
    code,
    check(problem, reporter) {
      problem.plan.jobs.forEach((job, index) => {
        const message = describeDemandImbalance(job);
        if (message === undefined) return;

        reporter.report({
          code,
          checker: name,
          message,
          context: { paths: [jobPath(index)], jobIds: [job.id] },
        });
      });
    },
  };
}
