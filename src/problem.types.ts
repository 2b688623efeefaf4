/**
 * Routing problem types.
 *
 * Types are derived from Zod schemas to ensure validation and types stay in sync.
 *
 * @see problem.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type {
  FleetSchema,
  JobPlaceSchema,
  JobSchema,
  JobTaskSchema,
  LocationSchema,
  PlanSchema,
  ProblemSchema,
  ShiftPlaceSchema,
  TimeWindowSchema,
  VehicleBreakSchema,
  VehicleCostsSchema,
  VehicleReloadSchema,
  VehicleShiftSchema,
  VehicleTypeSchema,
} from "./problem.schemas.js";

// --------------------------------------------------------------------------
// Types derived from Zod schemas
// --------------------------------------------------------------------------

/**
 * A `[start, end]` pair of RFC3339 timestamps, e.g.
 * `["2020-07-04T09:00:00Z", "2020-07-04T12:00:00Z"]`.
 *
 * @category Problem
 */
export type TimeWindow = z.infer<typeof TimeWindowSchema>;

/**
 * Either a coordinate (`lat`, `lng`) or an `index` into a routing matrix.
 *
 * @category Problem
 */
export type Location = z.infer<typeof LocationSchema>;

/** @category Problem */
export type JobPlace = z.infer<typeof JobPlaceSchema>;

/**
 * A single pickup or delivery of a job.
 *
 * - `places` (required): alternative places where the task can be served
 * - `demand` (required): whole quantity per capacity dimension
 * - `times` (optional): time windows in which the task may start
 *
 * @category Problem
 */
export type JobTask = z.infer<typeof JobTaskSchema>;

/**
 * A job with any number of pickups and deliveries.
 *
 * When a job has both, everything picked up must be delivered, so the
 * summed pickup demand equals the summed delivery demand.
 *
 * @category Problem
 */
export type Job = z.infer<typeof JobSchema>;

/** @category Problem */
export type Plan = z.infer<typeof PlanSchema>;

/** @category Problem */
export type ShiftPlace = z.infer<typeof ShiftPlaceSchema>;

/** @category Problem */
export type VehicleBreak = z.infer<typeof VehicleBreakSchema>;

/**
 * A stop during a shift where the vehicle unloads and reloads, so its
 * capacity can be used again. `times`, when given, must lie inside the shift.
 *
 * @category Problem
 */
export type VehicleReload = z.infer<typeof VehicleReloadSchema>;

/**
 * A working period of a vehicle. A shift without `end` is open-ended.
 *
 * @category Problem
 */
export type VehicleShift = z.infer<typeof VehicleShiftSchema>;

/** @category Problem */
export type VehicleCosts = z.infer<typeof VehicleCostsSchema>;

/**
 * A group of identical vehicles.
 *
 * `typeId` is unique among vehicle types and every entry of `vehicleIds` is
 * unique across the whole fleet.
 *
 * @category Problem
 */
export type VehicleType = z.infer<typeof VehicleTypeSchema>;

/** @category Problem */
export type Fleet = z.infer<typeof FleetSchema>;

/**
 * A complete routing problem definition.
 *
 * @category Problem
 */
export type Problem = z.infer<typeof ProblemSchema>;

// --------------------------------------------------------------------------
// Task roles
// --------------------------------------------------------------------------

export const TASK_ROLES = ["pickups", "deliveries"] as const;

/** Which task list of a job a task belongs to. */
export type TaskRole = (typeof TASK_ROLES)[number];
