import { TASK_ROLES } from "../../problem.types.js";
import { checkTimeWindows } from "../intervals.js";
import { VALIDATION_CODES } from "../validation.types.js";
import { reportIntervalIssues, TASK_LABELS, taskPath } from "../utils.js";
import type { ProblemChecker } from "./checkers.types.js";

/**
 * Reports invalid or overlapping time windows of job tasks.
 *
 * Every pickup and delivery has its own window list; each list is checked on
 * its own and each finding names the job, the task and the window(s).
 */
export function createJobTimeWindowsChecker(): ProblemChecker & { name: "job-time-windows" } {
  const name = "job-time-windows";
  const code = VALIDATION_CODES.JOB_TIME_WINDOWS;

  return {
    name,
    code,
    check(problem, reporter) {
      problem.plan.jobs.forEach((job, jobIndex) => {
        for (const role of TASK_ROLES) {
          job[role]?.forEach((task, taskIndex) => {
            const times = task.times ?? [];
            const path = taskPath(jobIndex, role, taskIndex);

            reportIntervalIssues(reporter, times, checkTimeWindows(times), {
              code,
              checker: name,
              subject: `Job "${job.id}" ${TASK_LABELS[role]} #${taskIndex}`,
              pathOf: (i) => `${path}.times[${i}]`,
              ids: { jobIds: [job.id] },
            });
          });
        }
      });
    },
  };
}
