import {
  VALIDATION_TITLES,
  type ValidationCode,
  type ValidationError,
  type ValidationResult,
  type ValidationSummary,
} from "./validation.types.js";

export interface ValidationReporter {
  report(error: Omit<ValidationError, "id">): void;

  // Query methods
  hasErrors(): boolean;
  getErrors(): ValidationError[];
}

/**
 * Generates a deterministic ID for a validation error.
 * Format: {code}:{paths}
 */
export function errorId(code: ValidationCode, paths: readonly string[]): string {
  return [code, paths.length > 0 ? paths.join(",") : "_"].join(":");
}

export class ValidationReporterImpl implements ValidationReporter {
  #errors: ValidationError[] = [];

  report(error: Omit<ValidationError, "id">): void {
    const id = errorId(error.code, error.context.paths);
    this.#errors.push({ id, ...error });
  }

  hasErrors(): boolean {
    return this.#errors.length > 0;
  }

  getErrors(): ValidationError[] {
    return [...this.#errors];
  }
}

/**
 * Concatenates the errors of several reporters, in the given order.
 */
export function mergeReports(reporters: readonly ValidationReporter[]): ValidationResult {
  const errors = reporters.flatMap((reporter) => reporter.getErrors());
  return { valid: errors.length === 0, errors };
}

// =============================================================================
// Validation Summary - pure function for aggregation
// =============================================================================

/**
 * Aggregates validation errors by code into summaries.
 * This is a pure function that doesn't modify the input.
 *
 * Summaries appear in the order their code was first reported.
 *
 * @example
 * ```typescript
 * const summaries = summarizeValidation(validateProblem(problem));
 * // summaries[0] = {
 * //   code: "E1000",
 * //   checker: "duplicate-job-ids",
 * //   title: "Duplicate job ids",
 * //   count: 1,
 * //   paths: ["plan.jobs[0]", "plan.jobs[3]"]
 * // }
 * ```
 */
export function summarizeValidation(
  result: ValidationResult,
  titles: Readonly<Record<string, string>> = VALIDATION_TITLES,
): readonly ValidationSummary[] {
  const groups = new Map<string, { checker: string; count: number; paths: string[] }>();

  for (const error of result.errors) {
    let group = groups.get(error.code);
    if (!group) {
      group = { checker: error.checker, count: 0, paths: [] };
      groups.set(error.code, group);
    }
    group.count++;
    group.paths.push(...error.context.paths);
  }

  const summaries: ValidationSummary[] = [];
  for (const [code, group] of groups) {
    summaries.push({
      code,
      checker: group.checker,
      title: titles[code] ?? group.checker,
      count: group.count,
      paths: group.paths,
    });
  }

  return summaries;
}
