import { describe, expect, it } from "vitest";
import {
  createDuplicateJobIdsChecker,
  createDuplicateVehicleIdsChecker,
  createDuplicateVehicleTypeIdsChecker,
} from "../../src/validation/checkers/index.js";
import { job, problem, runChecker, vehicleType } from "./helpers.js";

describe("duplicate-job-ids", () => {
  const checker = createDuplicateJobIdsChecker();

  it("reports nothing for unique ids", () => {
    expect(runChecker(checker, problem([job("a"), job("b"), job("c")]))).toEqual([]);
  });

  it("reports an id repeated three times once", () => {
    const errors = runChecker(checker, problem([job("a"), job("b"), job("a"), job("a")]));

    expect(errors).toEqual([
      {
        id: "E1000:plan.jobs[0],plan.jobs[2],plan.jobs[3]",
        code: "E1000",
        checker: "duplicate-job-ids",
        message: 'Job id "a" is used by 3 jobs',
        context: {
          paths: ["plan.jobs[0]", "plan.jobs[2]", "plan.jobs[3]"],
          jobIds: ["a"],
        },
      },
    ]);
  });

  it("reports every duplicated id in order of first occurrence", () => {
    const errors = runChecker(checker, problem([job("b"), job("a"), job("a"), job("b")]));
    expect(errors.map((error) => error.context.jobIds)).toEqual([["b"], ["a"]]);
  });
});

describe("duplicate-vehicle-type-ids", () => {
  const checker = createDuplicateVehicleTypeIdsChecker();

  it("reports nothing for unique type ids", () => {
    const types = [vehicleType("van", ["v1"]), vehicleType("truck", ["t1"])];
    expect(runChecker(checker, problem([], types))).toEqual([]);
  });

  it("names both entries sharing a type id", () => {
    const types = [
      vehicleType("van", ["v1"]),
      vehicleType("truck", ["t1"]),
      vehicleType("van", ["v2"]),
    ];
    const errors = runChecker(checker, problem([], types));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      code: "E1003",
      message: 'Vehicle type id "van" is used by 2 vehicle types',
      context: { paths: ["fleet.types[0]", "fleet.types[2]"], typeIds: ["van"] },
    });
  });
});

describe("duplicate-vehicle-ids", () => {
  const checker = createDuplicateVehicleIdsChecker();

  it("reports nothing when ids are unique across the fleet", () => {
    const types = [vehicleType("van", ["v1", "v2"]), vehicleType("truck", ["t1"])];
    expect(runChecker(checker, problem([], types))).toEqual([]);
  });

  it("reports an id shared by two vehicle types", () => {
    const types = [vehicleType("van", ["v1", "shared"]), vehicleType("truck", ["shared"])];
    const errors = runChecker(checker, problem([], types));

    expect(errors).toEqual([
      {
        id: "E1004:fleet.types[0].vehicleIds[1],fleet.types[1].vehicleIds[0]",
        code: "E1004",
        checker: "duplicate-vehicle-ids",
        message: 'Vehicle id "shared" is used 2 times in vehicle types "van", "truck"',
        context: {
          paths: ["fleet.types[0].vehicleIds[1]", "fleet.types[1].vehicleIds[0]"],
          vehicleIds: ["shared"],
          typeIds: ["van", "truck"],
        },
      },
    ]);
  });

  it("reports an id repeated within one vehicle type", () => {
    const errors = runChecker(checker, problem([], [vehicleType("van", ["v1", "v1"])]));

    expect(errors).toHaveLength(1);
    expect(errors[0]?.context.typeIds).toEqual(["van"]);
  });

  it("reports each duplicated id once however often it repeats", () => {
    const types = [
      vehicleType("van", ["x", "y"]),
      vehicleType("truck", ["x", "y"]),
      vehicleType("bike", ["x"]),
    ];
    const errors = runChecker(checker, problem([], types));

    expect(errors.map((error) => error.message)).toEqual([
      'Vehicle id "x" is used 3 times in vehicle types "van", "truck", "bike"',
      'Vehicle id "y" is used 2 times in vehicle types "van", "truck"',
    ]);
  });
});
