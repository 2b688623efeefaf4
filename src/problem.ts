import { ProblemSchema } from "./problem.schemas.js";
import type { Problem } from "./problem.types.js";
import { ProblemFormatError } from "./errors.js";

/**
 * Checks that `input` has the shape of a problem document and returns it typed.
 *
 * @throws {ProblemFormatError} when required fields are missing or have the wrong type
 *
 * @category Parsing
 */
export function parseProblem(input: unknown): Problem {
  const result = ProblemSchema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.issues;
    const location = first && first.path.length > 0 ? ` at ${formatIssuePath(first.path)}` : "";
    throw new ProblemFormatError(
      `Invalid problem definition${location}: ${first?.message ?? "unknown error"}`,
      result.error.issues,
    );
  }
  return result.data;
}

/**
 * Parses a problem document from JSON text.
 *
 * @throws {ProblemFormatError} when the text is not JSON or not a problem document
 *
 * @category Parsing
 */
export function parseProblemJson(text: string): Problem {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ProblemFormatError(`Invalid JSON: ${error.message}`);
    }
    throw error;
  }
  return parseProblem(input);
}

/**
 * Formats a schema issue path the way validation errors name fields,
 * e.g. `plan.jobs[0].pickups[1].demand`.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path
    .map((segment, i) =>
      typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`,
    )
    .join("");
}
