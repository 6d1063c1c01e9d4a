import {
	type Dirent,
	chmodSync,
	lstatSync,
	readdirSync,
	rmSync,
	rmdirSync,
	statSync,
	unlinkSync,
} from "node:fs";
import { join } from "node:path";
import type { DiagnosticSink, FsFailure } from "@scratchkeeper/diagnostics";
import { type FsOpsOptions, type FsResult, fsFailure, reportFailure, resolveSink } from "./result.js";
import { retryOnce } from "./retry.js";

export interface ClearResult {
	removed: number;
	failures: FsFailure[];
	rootRemoved: boolean;
}

const OWNER_WRITE = 0o200;
const PERMISSION_BITS = 0o7777;
const NO_EXCEPTIONS: ReadonlySet<string> = new Set();

/**
 * Empties `path`, then removes it when `removeSelf` is set. Never throws.
 *
 * Each file and subdirectory gets one retry after a yield. Entries that
 * still fail are left behind and recorded in the result. `exceptNames`
 * (case-insensitive) protects files directly under `path` only; nested
 * files with the same name are deleted.
 */
export function clearDirectory(
	path: string,
	removeSelf: boolean,
	exceptNames: readonly string[] = [],
	options?: FsOpsOptions,
): ClearResult {
	const result: ClearResult = { removed: 0, failures: [], rootRemoved: false };
	if (path === "") return result;

	const sink = resolveSink(options);
	const except = new Set(exceptNames.map((name) => name.toLowerCase()));
	clearLevel(path, except, sink, result);

	if (removeSelf) {
		removeRoot(path, sink, result);
	}
	return result;
}

// Only directories (or a root that is already gone) are removed here;
// files go through deleteFile.
function removeRoot(path: string, sink: DiagnosticSink, result: ClearResult): void {
	try {
		const stats = lstatSync(path, { throwIfNoEntry: false });
		if (stats !== undefined && !stats.isDirectory()) {
			const error = Object.assign(new Error(`ENOTDIR: not a directory, ${path}`), {
				code: "ENOTDIR",
			});
			result.failures.push(reportFailure(sink, fsFailure(path, "rm", error)));
			return;
		}
		rmSync(path, { recursive: true, force: true });
		result.rootRemoved = true;
	} catch (err) {
		result.failures.push(reportFailure(sink, fsFailure(path, "rm", err)));
	}
}

function clearLevel(
	directory: string,
	except: ReadonlySet<string>,
	sink: DiagnosticSink,
	result: ClearResult,
): void {
	let entries: Dirent[];
	try {
		entries = readdirSync(directory, { withFileTypes: true });
	} catch (err) {
		result.failures.push(reportFailure(sink, fsFailure(directory, "list", err)));
		return;
	}

	for (const entry of entries) {
		if (entry.isDirectory() || except.has(entry.name.toLowerCase())) continue;
		const filePath = join(directory, entry.name);
		const regular = entry.isFile();
		const deleted = retryOnce(filePath, "delete", () => {
			if (regular) makeWritable(filePath);
			unlinkSync(filePath);
		});
		record(deleted, sink, result);
	}

	for (const entry of entries) {
		if (!entry.isDirectory()) continue;
		const subdirectory = join(directory, entry.name);
		clearLevel(subdirectory, NO_EXCEPTIONS, sink, result);
		const removed = retryOnce(subdirectory, "rmdir", () => rmdirSync(subdirectory));
		record(removed, sink, result);
	}
}

function makeWritable(filePath: string): void {
	const { mode } = statSync(filePath);
	if ((mode & OWNER_WRITE) === 0) {
		chmodSync(filePath, (mode & PERMISSION_BITS) | OWNER_WRITE);
	}
}

function record(
	outcome: FsResult,
	sink: DiagnosticSink,
	result: ClearResult,
): void {
	if (outcome.ok) {
		result.removed++;
	} else {
		result.failures.push(reportFailure(sink, outcome));
	}
}
