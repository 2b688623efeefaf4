/**
 * Zod schemas for the routing problem document.
 *
 * These schemas describe the shape of a problem definition: plan, jobs,
 * fleet and shifts. TypeScript types are derived from these schemas using
 * z.infer to ensure they stay in sync.
 *
 * Timestamps are accepted as plain strings here. Whether they parse, and
 * whether windows are ordered and disjoint, is decided by the validation
 * checkers so that such problems are reported as findings rather than
 * rejected as malformed documents.
 *
 * @see problem.types.ts for the derived TypeScript types
 */

import { z } from "zod";

// --------------------------------------------------------------------------
// Common schemas
// --------------------------------------------------------------------------

/** `[start, end]` pair of RFC3339 timestamps. */
export const TimeWindowSchema = z.tuple([z.string(), z.string()]);

export const CoordinateLocationSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

/** Reference into an externally supplied routing matrix. */
export const IndexLocationSchema = z.object({
  index: z.number().int().nonnegative(),
});

export const LocationSchema = z.union([CoordinateLocationSchema, IndexLocationSchema]);

// --------------------------------------------------------------------------
// Plan schemas
// --------------------------------------------------------------------------

export const JobPlaceSchema = z.object({
  location: LocationSchema,
  duration: z.number().nonnegative(),
  tag: z.string().optional(),
});

export const JobTaskSchema = z.object({
  places: z.array(JobPlaceSchema).min(1),
  demand: z.array(z.number().int()),
  times: z.array(TimeWindowSchema).optional(),
  tag: z.string().optional(),
});

export const JobSchema = z.object({
  id: z.string(),
  pickups: z.array(JobTaskSchema).optional(),
  deliveries: z.array(JobTaskSchema).optional(),
  skills: z.array(z.string()).optional(),
});

export const PlanSchema = z.object({
  jobs: z.array(JobSchema),
});

// --------------------------------------------------------------------------
// Fleet schemas
// --------------------------------------------------------------------------

export const ShiftPlaceSchema = z.object({
  time: z.string(),
  location: LocationSchema,
});

export const VehicleBreakSchema = z.object({
  times: z.array(TimeWindowSchema).min(1),
  duration: z.number().nonnegative(),
  location: LocationSchema.optional(),
});

export const VehicleReloadSchema = z.object({
  times: z.array(TimeWindowSchema).optional(),
  location: LocationSchema,
  duration: z.number().nonnegative(),
  tag: z.string().optional(),
});

export const VehicleShiftSchema = z.object({
  start: ShiftPlaceSchema,
  end: ShiftPlaceSchema.optional(),
  breaks: z.array(VehicleBreakSchema).optional(),
  reloads: z.array(VehicleReloadSchema).optional(),
});

export const VehicleCostsSchema = z.object({
  fixed: z.number().nonnegative().optional(),
  distance: z.number().nonnegative(),
  time: z.number().nonnegative(),
});

export const VehicleTypeSchema = z.object({
  typeId: z.string(),
  vehicleIds: z.array(z.string()).min(1),
  profile: z.string(),
  costs: VehicleCostsSchema,
  capacity: z.array(z.number().int()),
  shifts: z.array(VehicleShiftSchema).min(1),
  skills: z.array(z.string()).optional(),
});

export const FleetSchema = z.object({
  types: z.array(VehicleTypeSchema),
});

// --------------------------------------------------------------------------
// Problem schema
// --------------------------------------------------------------------------

export const ProblemSchema = z.object({
  id: z.string().optional(),
  plan: PlanSchema,
  fleet: FleetSchema,
});
