import type { DiagnosticSink, FsFailure, FsOperation } from "@scratchkeeper/diagnostics";
import { consoleLogger, createFailureEvent, createLoggerSink } from "@scratchkeeper/diagnostics";

export type FsResult<T = void> = { ok: true; value: T } | FsFailure;

export const FS_OK: FsResult = { ok: true, value: undefined };

export interface FsOpsOptions {
	sink?: DiagnosticSink;
}

const defaultSink = createLoggerSink();

export function resolveSink(options?: FsOpsOptions): DiagnosticSink {
	return options?.sink ?? defaultSink;
}

export function formatError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		return typeof error.code === "string" ? error.code : undefined;
	}
	return undefined;
}

export function fsFailure(path: string, operation: FsOperation, error: unknown): FsFailure {
	const code = errorCode(error);
	return {
		ok: false,
		path,
		operation,
		message: formatError(error),
		...(code !== undefined ? { code } : {}),
	};
}

/**
 * Sends the failure to the sink and hands it back for the caller's result.
 * A throwing sink is logged and never reaches the caller.
 */
export function reportFailure(sink: DiagnosticSink, failure: FsFailure): FsFailure {
	try {
		sink.report(createFailureEvent(failure));
	} catch (err) {
		consoleLogger.warn("Error in diagnostic sink (swallowed)", { error: formatError(err) });
	}
	return failure;
}
