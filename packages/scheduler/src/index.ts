export const VERSION = "0.0.1";

export { MaintenanceRunStateSchema, MaintenanceScheduleSchema } from "./types.js";
export type { MaintenanceRunState, MaintenanceSchedule, MaintenanceTask } from "./types.js";
export { MaintenanceService } from "./service.js";
export type { MaintenanceRun, MaintenanceServiceOptions } from "./service.js";
