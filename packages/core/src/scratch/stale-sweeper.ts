import { type Dirent, existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import type { FsFailure } from "@scratchkeeper/diagnostics";
import { type FsOpsOptions, fsFailure, reportFailure, resolveSink } from "../fs/result.js";
import { deleteFile } from "../fs/safe-file-ops.js";

export const STALE_FILE_RETENTION_MS = 5 * 60 * 60 * 1000;

export interface SweepOptions extends FsOpsOptions {
	now?: number;
}

export interface SweepResult {
	deleted: string[];
	failures: FsFailure[];
}

/**
 * Deletes files directly under each root whose mtime is older than the
 * retention window. Subdirectories are left alone. Missing roots are
 * skipped; a failing root does not stop the others.
 */
export function sweepStaleFiles(roots: readonly string[], options: SweepOptions = {}): SweepResult {
	const sink = resolveSink(options);
	const cutoff = (options.now ?? Date.now()) - STALE_FILE_RETENTION_MS;
	const result: SweepResult = { deleted: [], failures: [] };

	for (const root of roots) {
		if (!existsSync(root)) continue;

		try {
			const entries: Dirent[] = readdirSync(root, { withFileTypes: true });
			for (const entry of entries) {
				if (!entry.isFile()) continue;
				sweepFile(join(root, entry.name), cutoff, options, result);
			}
		} catch (err) {
			result.failures.push(reportFailure(sink, fsFailure(root, "list", err)));
		}
	}

	return result;
}

function sweepFile(
	filePath: string,
	cutoff: number,
	options: SweepOptions,
	result: SweepResult,
): void {
	let modifiedAt: number;
	try {
		modifiedAt = statSync(filePath).mtimeMs;
	} catch (err) {
		result.failures.push(reportFailure(resolveSink(options), fsFailure(filePath, "stat", err)));
		return;
	}
	if (modifiedAt >= cutoff) return;

	const deleted = deleteFile(filePath, options);
	if (deleted.ok) {
		result.deleted.push(filePath);
	} else {
		result.failures.push(deleted);
	}
}
