import { MaintenanceService, type MaintenanceTask } from "@scratchkeeper/scheduler";
import type { MaintenanceConfig } from "../config/schema.js";
import type { ScratchSpace } from "./scratch-space.js";

interface MaintenanceLogger {
	warn: (msg: string, meta?: Record<string, unknown>) => void;
}

export function createSweepTask(scratch: ScratchSpace): MaintenanceTask {
	return () => {
		scratch.sweepStaleTempFiles();
	};
}

/** Scheduled stale-file sweep, or `null` when maintenance is disabled. */
export function createMaintenanceService(
	config: MaintenanceConfig,
	scratch: ScratchSpace,
	logger?: MaintenanceLogger,
): MaintenanceService | null {
	if (!config.enabled) {
		return null;
	}
	return new MaintenanceService({
		schedule: config.schedule,
		task: createSweepTask(scratch),
		logger,
	});
}
