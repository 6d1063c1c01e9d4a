import type { DiagnosticLogger, DiagnosticSink, FsFailure, FsFailureEvent } from "./types.js";

export const consoleLogger: DiagnosticLogger = {
	warn: (msg, meta) => {
		console.warn(`[scratchkeeper] ${msg}`, meta ?? {});
	},
};

export const noopSink: DiagnosticSink = {
	report: () => {},
};

export function createLoggerSink(logger: DiagnosticLogger = consoleLogger): DiagnosticSink {
	return {
		report: (event) => {
			const { failure } = event;
			logger.warn(`${failure.operation} failed: ${failure.path}`, {
				message: failure.message,
				code: failure.code,
				timestamp: event.timestamp.toISOString(),
			});
		},
	};
}

export function createFailureEvent(failure: FsFailure): FsFailureEvent {
	return { type: "fs:failure", failure, timestamp: new Date() };
}
