import type { z } from "zod";

/**
 * Error thrown when a problem document does not have the expected shape.
 *
 * Contains the schema issues reported while parsing, each with the path of the
 * offending field. Inconsistencies within a well-formed document (duplicate ids,
 * overlapping time windows, ...) are not thrown; they are reported by
 * {@link validateProblem}.
 *
 * @category Parsing
 */
export class ProblemFormatError extends Error {
  public readonly issues: readonly z.ZodIssue[];

  constructor(message: string, issues: readonly z.ZodIssue[] = []) {
    super(message);
    this.name = "ProblemFormatError";
    this.issues = issues;
  }
}
