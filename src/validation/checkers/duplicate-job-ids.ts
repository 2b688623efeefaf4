import { VALIDATION_CODES } from "../validation.types.js";
import { findDuplicates, jobPath } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Reports job ids used by more than one job.
 *
 * Each duplicated id is reported once, naming every job that carries it.
 */
export function createDuplicateJobIdsChecker(): ProblemChecker & { name: "duplicate-job-ids" } {
  const name = "duplicate-job-ids";
  const code = VALIDATION_CODES.DUPLICATE_JOB_IDS;

  return {
    name,
    code,
    check(problem, reporter) {
      const jobs = problem.plan.jobs.map((job, index) => ({ id: job.id, index }));

      for (const { key, occurrences } of findDuplicates(jobs, (job) => job.id)) {
        reporter.report({
          code,
          checker: name,
          message: `Job id "${key}" is used by ${occurrences.length} jobs`,
          context: {
            paths: occurrences.map((job) => jobPath(job.index)),
            jobIds: [key],
          },
        });
      }
    },
  };
}
