import { constants, copyFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { UnauthorizedAccessError } from "./errors.js";
import {
	FS_OK,
	type FsOpsOptions,
	type FsResult,
	fsFailure,
	reportFailure,
	resolveSink,
} from "./result.js";
import { directoryExists } from "./stat.js";

export interface CopyFileOptions extends FsOpsOptions {
	overwrite?: boolean;
	deleteSource?: boolean;
}

/**
 * Deletes a single file. An empty or missing path counts as deleted.
 * Throws {@link UnauthorizedAccessError} when `path` is a directory.
 */
export function deleteFile(path: string, options?: FsOpsOptions): FsResult {
	if (path === "") return FS_OK;

	const sink = resolveSink(options);
	let isDirectory: boolean;
	try {
		isDirectory = directoryExists(path);
	} catch (err) {
		return reportFailure(sink, fsFailure(path, "stat", err));
	}
	if (isDirectory) {
		throw new UnauthorizedAccessError(path);
	}

	try {
		rmSync(path, { force: true });
		return FS_OK;
	} catch (err) {
		return reportFailure(sink, fsFailure(path, "delete", err));
	}
}

export function copyFile(
	source: string,
	destination: string,
	options: CopyFileOptions = {},
): FsResult {
	const sink = resolveSink(options);
	const overwrite = options.overwrite ?? true;

	try {
		copyFileSync(source, destination, overwrite ? 0 : constants.COPYFILE_EXCL);
	} catch (err) {
		return reportFailure(sink, fsFailure(source, "copy", err));
	}

	if (options.deleteSource === true) {
		try {
			return deleteFile(source, options);
		} catch (err) {
			return reportFailure(sink, fsFailure(source, "delete", err));
		}
	}
	return FS_OK;
}

/** Empties a file in place. Failures go to the sink only. */
export function truncateFile(path: string, options?: FsOpsOptions): void {
	if (path === "") return;
	try {
		writeFileSync(path, "");
	} catch (err) {
		reportFailure(resolveSink(options), fsFailure(path, "truncate", err));
	}
}

export function countFiles(directoryPath: string, options?: FsOpsOptions): number {
	try {
		return readdirSync(directoryPath, { withFileTypes: true }).filter((entry) => entry.isFile())
			.length;
	} catch (err) {
		reportFailure(resolveSink(options), fsFailure(directoryPath, "list", err));
		return 0;
	}
}
