export const VERSION = "0.0.1";

export { DiagnosticBus } from "./bus.js";
export type { DiagnosticBusOptions } from "./bus.js";
export { consoleLogger, createFailureEvent, createLoggerSink, noopSink } from "./sinks.js";
export type {
	DiagnosticEvent,
	DiagnosticEventType,
	DiagnosticHandler,
	DiagnosticLogger,
	DiagnosticSink,
	FsFailure,
	FsFailureEvent,
	FsOperation,
} from "./types.js";
