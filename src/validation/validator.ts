import * as z from "zod";
import type { Problem } from "../problem.types.js";
import { parseProblem } from "../problem.js";
import { BUILT_IN_CHECKER_NAMES } from "./checkers/checkers.types.js";
import type { CheckerName, ProblemChecker } from "./checkers/checkers.types.js";
import { createCheckerSet, getBuiltInCheckers } from "./checkers/registry.js";
import { mergeReports, ValidationReporterImpl } from "./validation-reporter.js";
import type { ValidationResult } from "./validation.types.js";

const ValidatorOptionsSchema = z.object({
  skip: z.array(z.enum(BUILT_IN_CHECKER_NAMES)).optional(),
});

/**
 * Configuration for {@link ProblemValidator}.
 *
 * @example Skip a built-in checker and add a custom one
 * ```typescript
 * const validator = new ProblemValidator({
 *   skip: ["capacity-dimensions"],
 *   checkers: [
 *     {
 *       name: "no-empty-plan",
 *       code: "X0001",
 *       check(problem, reporter) {
 *         if (problem.plan.jobs.length > 0) return;
 *         reporter.report({
 *           code: "X0001",
 *           checker: "no-empty-plan",
 *           message: "Plan has no jobs",
 *           context: { paths: ["plan.jobs"] },
 *         });
 *       },
 *     },
 *   ],
 * });
 * ```
 */
export interface ValidatorOptions {
  /** Built-in checkers not to run. */
  skip?: CheckerName[];
  /**
   * Custom checkers, run after the built-in ones in the given order.
   * They may not reuse a built-in checker's name.
   */
  checkers?: ProblemChecker[];
}

/**
 * Runs every checker against a problem and collects what they report.
 *
 * Checkers run in a fixed order: the built-in ones from `E1000` to `E1008`,
 * then custom checkers. Each checker writes into its own reporter and the
 * reports are concatenated in checker order, so identical problems always
 * produce identical error lists. A failing check never stops the others.
 */
export class ProblemValidator {
  readonly checkers: readonly ProblemChecker[];

  constructor(options: ValidatorOptions = {}) {
    const { skip } = ValidatorOptionsSchema.parse({ skip: options.skip });
    this.checkers = [...getBuiltInCheckers(skip), ...createCheckerSet(options.checkers ?? [])];
  }

  validate(problem: Problem): ValidationResult {
    const reporters = this.checkers.map((checker) => {
      const reporter = new ValidationReporterImpl();
      checker.check(problem, reporter);
      return reporter;
    });
    return mergeReports(reporters);
  }
}

/**
 * Validates a parsed problem definition.
 *
 * @example
 * ```typescript
 * const result = validateProblem(problem);
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.log(`${error.code} ${error.message} (${error.context.paths.join(", ")})`);
 *   }
 * }
 * ```
 *
 * @category Validation
 */
export function validateProblem(problem: Problem, options?: ValidatorOptions): ValidationResult {
  return new ProblemValidator(options).validate(problem);
}

/**
 * Parses a plain problem document and validates it.
 *
 * @throws {ProblemFormatError} when the document does not have the shape of a problem
 *
 * @category Validation
 */
export function validateProblemDocument(
  input: unknown,
  options?: ValidatorOptions,
): ValidationResult {
  return validateProblem(parseProblem(input), options);
}
