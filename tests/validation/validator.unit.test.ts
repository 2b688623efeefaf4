import { describe, expect, it } from "vitest";
import { ProblemFormatError } from "../../src/errors.js";
import type { ProblemChecker } from "../../src/validation/checkers/checkers.types.js";
import { builtInCheckers, createCheckerSet } from "../../src/validation/checkers/registry.js";
import {
  ProblemValidator,
  validateProblem,
  validateProblemDocument,
} from "../../src/validation/validator.js";
import { job, problem, shift, task, vehicleType } from "./helpers.js";

const lateJob = job("late", {
  pickups: [task([1], [["2020-07-04T12:00:00Z", "2020-07-04T11:00:00Z"]])],
});

/** One instance each of the six core problems, nothing else. */
const sixProblems = problem(
  [
    job("dup"),
    job("dup"),
    job("unbalanced", { pickups: [task([2])], deliveries: [task([1])] }),
    lateJob,
  ],
  [
    vehicleType("van", ["v1"]),
    vehicleType("van", ["v2"]),
    vehicleType("truck", ["v1"], { shifts: [shift(8, 14), shift(13, 18)] }),
  ],
);

const emptyPlanChecker: ProblemChecker = {
  name: "no-empty-plan",
  code: "X0001",
  check(input, reporter) {
    if (input.plan.jobs.length > 0) return;
    reporter.report({
      code: "X0001",
      checker: "no-empty-plan",
      message: "Plan has no jobs",
      context: { paths: ["plan.jobs"] },
    });
  },
};

describe("validateProblem", () => {
  it("returns valid for a consistent problem", () => {
    const input = problem(
      [job("job1", { pickups: [task([1])], deliveries: [task([1])] }), job("job2")],
      [vehicleType("van", ["v1", "v2"]), vehicleType("truck", ["t1"])],
    );
    expect(validateProblem(input)).toEqual({ valid: true, errors: [] });
  });

  it("reports all six problems in one run, in checker order", () => {
    const result = validateProblem(sixProblems);

    expect(result.valid).toBe(false);
    expect(result.errors.map((error) => [error.code, error.message])).toEqual([
      ["E1000", 'Job id "dup" is used by 2 jobs'],
      ["E1001", 'Job "unbalanced" picks up [2] but delivers [1]'],
      [
        "E1002",
        'Job "late" pickup #0: time window #0 starts at 2020-07-04T12:00:00Z, ' +
          "not before its end 2020-07-04T11:00:00Z",
      ],
      ["E1003", 'Vehicle type id "van" is used by 2 vehicle types'],
      ["E1004", 'Vehicle id "v1" is used 2 times in vehicle types "van", "truck"'],
      ["E1005", 'Vehicle type "truck": shifts #0 and #1 overlap'],
    ]);
  });

  it("reports a job mixing demand dimensions only once", () => {
    const mixed = job("unbalanced", { pickups: [task([1, 0])], deliveries: [task([1])] });
    const input = problem([job("dup"), job("dup"), mixed, lateJob], sixProblems.fleet.types);
    const result = validateProblem(input);

    expect(result.errors.map((error) => error.code)).toEqual([
      "E1000",
      "E1001",
      "E1002",
      "E1003",
      "E1004",
      "E1005",
    ]);
    expect(result.errors[1]?.message).toBe(
      'Job "unbalanced" mixes demand dimensions: pickups have 2, deliveries have 1',
    );
  });

  it("produces identical output for identical input", () => {
    expect(validateProblem(sixProblems)).toEqual(validateProblem(sixProblems));
    expect(validateProblem(structuredClone(sixProblems))).toEqual(validateProblem(sixProblems));
  });

  it("does not modify the problem", () => {
    const copy = structuredClone(sixProblems);
    validateProblem(sixProblems);
    expect(sixProblems).toEqual(copy);
  });

  it("skips built-in checkers by name", () => {
    const result = validateProblem(sixProblems, { skip: ["duplicate-job-ids", "demand-balance"] });
    expect(result.errors.map((error) => error.code)).toEqual(["E1002", "E1003", "E1004", "E1005"]);
  });

  it("runs custom checkers after the built-in ones", () => {
    const input = problem([], [vehicleType("van", ["v1"]), vehicleType("van", ["v2"])]);
    const result = validateProblem(input, { checkers: [emptyPlanChecker] });

    expect(result.errors.map((error) => error.id)).toEqual([
      "E1003:fleet.types[0],fleet.types[1]",
      "X0001:plan.jobs",
    ]);
  });
});

describe("ProblemValidator", () => {
  it("runs built-in checkers in a fixed order", () => {
    const validator = new ProblemValidator({ checkers: [emptyPlanChecker] });
    expect(validator.checkers.map((checker) => checker.code)).toEqual([
      "E1000",
      "E1001",
      "E1002",
      "E1003",
      "E1004",
      "E1005",
      "E1006",
      "E1007",
      "E1008",
      "X0001",
    ]);
  });

  it("can be reused across problems", () => {
    const validator = new ProblemValidator();
    expect(validator.validate(problem([job("a")])).valid).toBe(true);
    expect(validator.validate(sixProblems).errors).toHaveLength(6);
  });
});

describe("createCheckerSet", () => {
  it("rejects a custom checker reusing a built-in name", () => {
    const impostor: ProblemChecker = { name: "duplicate-job-ids", code: "E1000", check() {} };
    expect(() => createCheckerSet([impostor])).toThrow(
      'Cannot override built-in checker "duplicate-job-ids" with a custom checker',
    );
  });

  it("allows passing a built-in checker itself", () => {
    const checkers = [builtInCheckers["demand-balance"]];
    expect(createCheckerSet(checkers)).toBe(checkers);
  });

  it("rejects two custom checkers with the same name", () => {
    expect(() => createCheckerSet([emptyPlanChecker, { ...emptyPlanChecker }])).toThrow(
      'Checker "no-empty-plan" is registered more than once',
    );
  });
});

describe("validateProblemDocument", () => {
  it("parses and validates a plain document", () => {
    const document: unknown = JSON.parse(JSON.stringify(sixProblems));
    expect(validateProblemDocument(document)).toEqual(validateProblem(sixProblems));
  });

  it("throws for a document without a fleet", () => {
    expect(() => validateProblemDocument({ plan: { jobs: [] } })).toThrow(ProblemFormatError);
  });
});
