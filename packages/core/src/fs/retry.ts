import type { FsOperation } from "@scratchkeeper/diagnostics";
import { FS_OK, type FsResult, fsFailure } from "./result.js";

const yieldCell = new Int32Array(new SharedArrayBuffer(4));

/** Zero-duration wait: gives other threads and processes a turn without sleeping. */
export function yieldThread(): void {
	Atomics.wait(yieldCell, 0, 0, 0);
}

/**
 * Runs `action`, and on failure yields once and runs it again.
 * Only the second failure is returned; nothing is reported here.
 */
export function retryOnce(path: string, operation: FsOperation, action: () => void): FsResult {
	try {
		action();
		return FS_OK;
	} catch {
		yieldThread();
	}
	try {
		action();
		return FS_OK;
	} catch (err) {
		return fsFailure(path, operation, err);
	}
}
