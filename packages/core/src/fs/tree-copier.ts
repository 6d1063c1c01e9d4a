import { type Dirent, mkdirSync, readdirSync } from "node:fs";
import { join, resolve } from "node:path";
import type { DiagnosticSink, FsFailure } from "@scratchkeeper/diagnostics";
import { type FsOpsOptions, fsFailure, reportFailure, resolveSink } from "./result.js";
import { copyFile } from "./safe-file-ops.js";

export interface CopyDirectoryOptions extends FsOpsOptions {
	overwrite?: boolean;
}

export interface TreeCopyResult {
	ok: boolean;
	copied: number;
	failures: FsFailure[];
}

/**
 * Textual check: a target whose absolute path contains the source's is
 * refused, including siblings such as `/data/foo` and `/data/foobar`.
 */
export function isSelfCopy(source: string, target: string): boolean {
	return resolve(target).includes(resolve(source));
}

export function copyDirectory(
	source: string,
	target: string,
	options: CopyDirectoryOptions = {},
): TreeCopyResult {
	if (isSelfCopy(source, target)) {
		return {
			ok: false,
			copied: 0,
			failures: [
				{
					ok: false,
					path: target,
					operation: "copy",
					message: `Cannot copy a directory into itself: ${source} -> ${target}`,
				},
			],
		};
	}

	const sink = resolveSink(options);
	const result: TreeCopyResult = { ok: true, copied: 0, failures: [] };
	copyLevel(source, target, options.overwrite ?? true, sink, result);
	result.ok = result.failures.length === 0;
	return result;
}

function copyLevel(
	source: string,
	target: string,
	overwrite: boolean,
	sink: DiagnosticSink,
	result: TreeCopyResult,
): void {
	let entries: Dirent[];
	try {
		entries = readdirSync(source, { withFileTypes: true });
	} catch (err) {
		result.failures.push(reportFailure(sink, fsFailure(source, "list", err)));
		return;
	}

	try {
		mkdirSync(target, { recursive: true });
	} catch (err) {
		result.failures.push(reportFailure(sink, fsFailure(target, "mkdir", err)));
		return;
	}

	for (const entry of entries) {
		if (entry.isDirectory()) continue;
		const copied = copyFile(join(source, entry.name), join(target, entry.name), {
			overwrite,
			sink,
		});
		if (copied.ok) {
			result.copied++;
		} else {
			result.failures.push(copied);
		}
	}

	for (const entry of entries) {
		if (!entry.isDirectory()) continue;
		copyLevel(join(source, entry.name), join(target, entry.name), overwrite, sink, result);
	}
}
