export const VERSION = "0.0.1";

export {
	MaintenanceConfigSchema,
	ScratchKeeperConfigSchema,
	TenantConfigSchema,
} from "./config/schema.js";
export type { MaintenanceConfig, ScratchKeeperConfig, TenantConfig } from "./config/schema.js";
export { loadConfig } from "./config/loader.js";
export { UnauthorizedAccessError } from "./fs/errors.js";
export { FS_OK, formatError, fsFailure, reportFailure, resolveSink } from "./fs/result.js";
export type { FsOpsOptions, FsResult } from "./fs/result.js";
export { retryOnce, yieldThread } from "./fs/retry.js";
export { copyFile, countFiles, deleteFile, truncateFile } from "./fs/safe-file-ops.js";
export type { CopyFileOptions } from "./fs/safe-file-ops.js";
export { copyDirectory, isSelfCopy } from "./fs/tree-copier.js";
export type { CopyDirectoryOptions, TreeCopyResult } from "./fs/tree-copier.js";
export { clearDirectory } from "./fs/tree-clearer.js";
export type { ClearResult } from "./fs/tree-clearer.js";
export { allocateUniqueName } from "./scratch/name-allocator.js";
export {
	resolveAppPath,
	ScratchPathResolver,
	toScratchRootConfig,
} from "./scratch/path-resolver.js";
export type {
	ScratchRootConfig,
	ScratchRootKind,
	TenantContext,
} from "./scratch/path-resolver.js";
export { STALE_FILE_RETENTION_MS, sweepStaleFiles } from "./scratch/stale-sweeper.js";
export type { SweepOptions, SweepResult } from "./scratch/stale-sweeper.js";
export { ScratchSpace } from "./scratch/scratch-space.js";
export type { ScratchSpaceOptions } from "./scratch/scratch-space.js";
export { createMaintenanceService, createSweepTask } from "./scratch/maintenance.js";
export {
	consoleLogger,
	createLoggerSink,
	DiagnosticBus,
	noopSink,
} from "@scratchkeeper/diagnostics";
export type {
	DiagnosticEvent,
	DiagnosticLogger,
	DiagnosticSink,
	FsFailure,
	FsOperation,
} from "@scratchkeeper/diagnostics";
export { MaintenanceService } from "@scratchkeeper/scheduler";
export type { MaintenanceRunState, MaintenanceSchedule } from "@scratchkeeper/scheduler";
