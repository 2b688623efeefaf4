export { createCapacityDimensionsChecker } from "./capacity-dimensions.js";
export { createDemandBalanceChecker } from "./demand-balance.js";
export { createDuplicateJobIdsChecker } from "./duplicate-job-ids.js";
export { createDuplicateVehicleIdsChecker } from "./duplicate-vehicle-ids.js";
export { createDuplicateVehicleTypeIdsChecker } from "./duplicate-vehicle-type-ids.js";
export { createJobTimeWindowsChecker } from "./job-time-windows.js";
export { createVehicleBreakTimesChecker } from "./vehicle-break-times.js";
export { createVehicleReloadTimesChecker } from "./vehicle-reload-times.js";
export { createVehicleShiftTimesChecker } from "./vehicle-shift-times.js";
